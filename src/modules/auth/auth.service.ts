/**
 * =============================================================================
 * AUTH MODULE - SERVICE
 * =============================================================================
 *
 * Username/password login and JWT access tokens.
 *
 * SECURITY:
 * - Passwords are stored as bcrypt hashes only
 * - Tokens are HS256, signed with JWT_SECRET from the environment
 * - Login failures never reveal whether the username exists
 * =============================================================================
 */

import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { config } from '../../config/environment';
import { createUnitOfWork, UnitOfWork } from '../../shared/database/db';
import { logger } from '../../shared/services/logger.service';
import {
  AuthenticationError,
  DEFAULT_TOKEN_TTL_MINUTES,
  ErrorCode,
  TOKEN_TYPE,
  TokenExpiredError,
  UnauthorizedError
} from '../../core';
import { PgUserRepository, UserRepository } from './auth.repository';

/**
 * Who a request or a token belongs to
 */
export interface AuthIdentity {
  id: number;
  username: string;
}

/**
 * Identity recovered from a verified bearer token
 */
export interface AuthenticatedUser {
  username: string;
  expiresAt: Date;
}

/**
 * Body of a successful POST /auth/token
 */
export interface TokenResponse {
  access_token: string;
  token_type: typeof TOKEN_TYPE;
}

export interface AuthServiceOptions {
  secret: string;
  loginTokenTtlMinutes: number;
  bcryptRounds: number;
}

export class AuthService {
  constructor(
    private readonly unitOfWork: UnitOfWork<UserRepository>,
    private readonly options: AuthServiceOptions
  ) {}

  /**
   * Check a username/password pair.
   * Returns null ("not authenticated") for an unknown user or a wrong password.
   */
  async authenticate(username: string, password: string): Promise<AuthIdentity | null> {
    const user = await this.unitOfWork(
      (repository) => repository.findByUsername(username),
      { readOnly: true }
    );

    if (!user) {
      logger.warn('[AUTH] Login failed', { username, reason: 'unknown_user' });
      return null;
    }

    const matches = await bcrypt.compare(password, user.hashed_password);
    if (!matches) {
      logger.warn('[AUTH] Login failed', { username, reason: 'bad_password' });
      return null;
    }

    return { id: user.id, username: user.username };
  }

  /**
   * Signed access token with `sub` = username and an `exp` claim
   */
  issueToken(identity: Pick<AuthIdentity, 'username'>, expiresInMinutes: number = DEFAULT_TOKEN_TTL_MINUTES): string {
    return jwt.sign(
      { sub: identity.username },
      this.options.secret,
      { algorithm: 'HS256', expiresIn: Math.round(expiresInMinutes * 60) }
    );
  }

  /**
   * authenticate + issueToken with the login lifetime
   */
  async login(username: string, password: string): Promise<TokenResponse> {
    const identity = await this.authenticate(username, password);
    if (!identity) {
      throw new AuthenticationError();
    }

    logger.info('[AUTH] Token issued', { username: identity.username });

    return {
      access_token: this.issueToken(identity, this.options.loginTokenTtlMinutes),
      token_type: TOKEN_TYPE
    };
  }

  /**
   * Verify signature and expiry of a bearer token
   */
  verifyToken(token: string): AuthenticatedUser {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, { algorithms: ['HS256'] });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new TokenExpiredError();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new UnauthorizedError('Invalid token', ErrorCode.AUTH_TOKEN_INVALID);
      }
      throw error;
    }

    if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || typeof decoded.exp !== 'number') {
      throw new UnauthorizedError('Invalid token payload', ErrorCode.AUTH_TOKEN_INVALID);
    }

    return { username: decoded.sub, expiresAt: new Date(decoded.exp * 1000) };
  }

  /**
   * Provision an account (create-user command)
   */
  async createUser(username: string, password: string): Promise<AuthIdentity> {
    const hashedPassword = await bcrypt.hash(password, this.options.bcryptRounds);
    const user = await this.unitOfWork((repository) => repository.create(username, hashedPassword));

    logger.info('[AUTH] User created', { userId: user.id, username: user.username });
    return { id: user.id, username: user.username };
  }
}

export const authService = new AuthService(
  createUnitOfWork((client) => new PgUserRepository(client)),
  {
    secret: config.jwt.secret,
    loginTokenTtlMinutes: config.jwt.accessTokenExpireMinutes,
    bcryptRounds: config.auth.bcryptRounds
  }
);
