#!/usr/bin/env ts-node

/**
 * Applies pending TypeORM migrations (tables and indexes for videos and snapshots).
 *
 * Usage:
 *   npm run migrate
 */

import 'reflect-metadata';
import { AppDataSource } from '../config/database';
import { logger } from '../config/logger';

async function main() {
  await AppDataSource.initialize();
  logger.info('✅ Database connection initialized');

  try {
    const applied = await AppDataSource.runMigrations({ transaction: 'each' });
    if (applied.length === 0) {
      logger.info('📋 Schema is up to date');
    }
    for (const migration of applied) {
      logger.info(`🗄️ Applied migration ${migration.name}`);
    }
  } finally {
    await AppDataSource.destroy();
  }
}

main().catch((error) => {
  logger.error('❌ Migration failed:', error);
  process.exitCode = 1;
});
