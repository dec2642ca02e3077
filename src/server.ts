import 'reflect-metadata';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { env } from './config/env';
import { logger } from './config/logger';
import { AppDataSource, checkDatabaseHealth, closeDatabase, initializeDatabase } from './config/database';
import { createAnswerRoutes } from './routes/answer';
import { createHealthRoutes } from './routes/health';
import { AnalyticsAnswerService, buildProducers } from './services/AnalyticsAnswerService';
import { PostgresQueryExecutor } from './services/query/PostgresQueryExecutor';

const app = express();

app.use(helmet());
app.use(compression());
app.use(cors());
app.use(express.json({ limit: '64kb' }));
app.use(express.text({ type: 'text/plain', limit: '64kb' }));

const answerService = new AnalyticsAnswerService({
  producers: buildProducers(env.llm),
  executor: new PostgresQueryExecutor(AppDataSource),
});

app.use('/health', createHealthRoutes(checkDatabaseHealth));
app.use('/api/health', createHealthRoutes(checkDatabaseHealth));
app.use('/api/answer', createAnswerRoutes(answerService));

const startServer = async () => {
  try {
    await initializeDatabase();

    const server = app.listen(env.api.port, env.api.host, () => {
      logger.info(`🚀 Video metrics answer service running on ${env.api.host}:${env.api.port}`);
      logger.info(`🌍 Environment: ${env.api.nodeEnv}`);
      logger.info(`🤖 LLM intent producer: ${env.llm.enabled ? `enabled (${env.llm.model})` : 'disabled'}`);
      logger.info(`📋 Available endpoints:`);
      logger.info(`   GET  /api/health`);
      logger.info(`   POST /api/answer`);
    });

    const gracefulShutdown = async (signal: string) => {
      logger.info(`🔄 Received ${signal}. Starting graceful shutdown...`);
      try {
        server.close(() => {
          logger.info('📴 HTTP server closed');
        });
        await closeDatabase();
        logger.info('✅ Graceful shutdown completed');
        process.exit(0);
      } catch (error) {
        logger.error('❌ Error during graceful shutdown:', error);
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  } catch (error) {
    logger.error('❌ Failed to start server:', error);
    process.exit(1);
  }
};

process.on('unhandledRejection', (reason) => {
  logger.error('❌ Unhandled Rejection:', reason);
});

void startServer();
