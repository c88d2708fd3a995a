/**
 * =============================================================================
 * AUTH MODULE - REPOSITORY
 * =============================================================================
 */

import { DatabaseError } from 'pg';
import { Queryable } from '../../shared/database/db';
import { UserExistsError } from '../../core';

export interface UserRecord {
  id: number;
  username: string;
  hashed_password: string;
}

export interface UserRepository {
  findByUsername(username: string): Promise<UserRecord | null>;
  /** Throws UserExistsError when the username is taken */
  create(username: string, hashedPassword: string): Promise<UserRecord>;
}

// Postgres unique_violation
const UNIQUE_VIOLATION = '23505';

export class PgUserRepository implements UserRepository {
  constructor(private readonly client: Queryable) {}

  async findByUsername(username: string): Promise<UserRecord | null> {
    const { rows } = await this.client.query<UserRecord>(
      'SELECT id, username, hashed_password FROM users WHERE username = $1',
      [username]
    );
    return rows[0] ?? null;
  }

  async create(username: string, hashedPassword: string): Promise<UserRecord> {
    try {
      const { rows } = await this.client.query<UserRecord>(
        `INSERT INTO users (username, hashed_password)
         VALUES ($1, $2)
         RETURNING id, username, hashed_password`,
        [username, hashedPassword]
      );
      const [created] = rows;
      if (!created) {
        throw new Error('INSERT INTO users returned no row');
      }
      return created;
    } catch (error) {
      if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw new UserExistsError(username);
      }
      throw error;
    }
  }
}
