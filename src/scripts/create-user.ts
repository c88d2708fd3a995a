#!/usr/bin/env node
/**
 * =============================================================================
 * CREATE USER - account provisioning command
 * =============================================================================
 *
 * Usage:
 *   create-user <username> [password]
 *
 * The password may instead be supplied through NEW_USER_PASSWORD so it does
 * not end up in shell history.
 * =============================================================================
 */

import { authService } from '../modules/auth/auth.service';
import { createUserSchema } from '../modules/auth/auth.schema';
import { closePool, ensureSchema } from '../shared/database/db';
import { config } from '../config/environment';
import { logger } from '../shared/services/logger.service';
import { AppError } from '../core';

export function parseCreateUserArgs(argv: string[], env: NodeJS.ProcessEnv = process.env) {
  const [username, password = env.NEW_USER_PASSWORD] = argv;
  return createUserSchema.safeParse({ username, password });
}

async function main(): Promise<number> {
  const parsed = parseCreateUserArgs(process.argv.slice(2));
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      logger.error(`${issue.path.join('.') || 'input'}: ${issue.message}`);
    }
    logger.error('Usage: create-user <username> [password]  (or set NEW_USER_PASSWORD)');
    return 2;
  }

  try {
    if (config.database.autoMigrate) {
      await ensureSchema();
    }
    const user = await authService.createUser(parsed.data.username, parsed.data.password);
    logger.info(`Created user "${user.username}" (id ${user.id})`);
    return 0;
  } catch (error) {
    if (error instanceof AppError) {
      logger.error(error.message, { code: error.code });
      return 1;
    }
    throw error;
  } finally {
    await closePool();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      logger.error('create-user failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      process.exit(1);
    });
}
