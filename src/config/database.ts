import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { env } from './env';
import { logger } from './logger';

import { Video } from '../models/Video';
import { VideoSnapshot } from '../models/VideoSnapshot';
import { CreateVideoMetricsTables1730000000000 } from '../migrations/CreateVideoMetricsTables';

// Create TypeORM DataSource
export const AppDataSource = new DataSource({
  type: 'postgres',
  host: env.database.host,
  port: env.database.port,
  username: env.database.username,
  password: env.database.password,
  database: env.database.name,
  // The answer pipeline only reads; schema changes go through migrations
  synchronize: false,
  logging: env.database.logging,
  entities: [Video, VideoSnapshot],
  migrations: [CreateVideoMetricsTables1730000000000],
  subscribers: [],
  ssl: env.api.nodeEnv === 'production' ? { rejectUnauthorized: false } : false,
  extra: {
    max: env.database.poolSize,
    idleTimeoutMillis: 60000,
    connectionTimeoutMillis: 5000,
    statement_timeout: env.database.statementTimeoutMs,
    // Date boundaries are UTC calendar days
    options: '-c timezone=UTC',
  },
});

// Initialize database connection
export const initializeDatabase = async (): Promise<void> => {
  logger.info('🗄️ Initializing database connection...');
  logger.info(`📍 Connecting to: ${env.database.host}:${env.database.port}/${env.database.name}`);

  if (AppDataSource.isInitialized) {
    logger.info('📋 Database already initialized');
    return;
  }

  try {
    await AppDataSource.initialize();
    await AppDataSource.query('SELECT 1');
    logger.info('✅ Database connection established successfully');

    const entityNames = AppDataSource.entityMetadatas.map(meta => meta.name);
    logger.info(`📊 Loaded ${entityNames.length} entities: ${entityNames.join(', ')}`);
  } catch (error) {
    logger.error('❌ Database connection failed:', error);

    if (error instanceof Error) {
      if (error.message.includes('ECONNREFUSED')) {
        logger.error('💡 Tip: Make sure PostgreSQL is running on the specified host and port');
      } else if (error.message.includes('authentication failed')) {
        logger.error('💡 Tip: Check your database username and password');
      }
    }
    throw error;
  }
};

// Close database connection
export const closeDatabase = async (): Promise<void> => {
  try {
    if (AppDataSource.isInitialized) {
      await AppDataSource.destroy();
    }
    logger.info('📴 Database connection closed');
  } catch (error) {
    logger.error('❌ Error closing database connection:', error);
  }
};

// Health check: the connection is up and the metrics schema is readable
export const checkDatabaseHealth = async (
  dataSource: Pick<DataSource, 'isInitialized' | 'query'> = AppDataSource
): Promise<boolean> => {
  const target = `${env.database.host}:${env.database.port}/${env.database.name}`;
  if (!dataSource.isInitialized) {
    logger.warn(`🩺 No connection to ${target} for health check`);
    return false;
  }
  try {
    await dataSource.query('SELECT 1 FROM videos LIMIT 1');
    return true;
  } catch (error) {
    logger.error(`❌ Health check against ${target} failed:`, error);
    return false;
  }
};
