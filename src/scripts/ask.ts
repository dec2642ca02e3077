#!/usr/bin/env ts-node

/**
 * Answers one question from the command line and prints the integer reply.
 *
 * Usage:
 *   npm run ask -- "Сколько видео опубликовано в ноябре 2025?"
 *   npm run ask -- "Сколько видео опубликовано в ноябре 2025?" --dataset ./videos.json
 *
 * With --dataset the question runs against the JSON dump in memory; otherwise against Postgres.
 */

import 'reflect-metadata';
import { env } from '../config/env';
import { logger } from '../config/logger';
import { AppDataSource, closeDatabase, initializeDatabase } from '../config/database';
import { AnalyticsAnswerService, buildProducers, formatReply } from '../services/AnalyticsAnswerService';
import { loadDatasetFile } from '../services/dataset/datasetFile';
import { InMemoryQueryExecutor } from '../services/query/InMemoryQueryExecutor';
import { PostgresQueryExecutor } from '../services/query/PostgresQueryExecutor';
import { QueryExecutor } from '../services/query/QueryExecutor';

interface AskArgs {
  question: string;
  datasetPath: string | null;
}

function parseArgs(args: string[]): AskArgs {
  const words: string[] = [];
  let datasetPath: string | null = null;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--dataset') {
      datasetPath = args[i + 1] ?? null;
      i++;
    } else {
      words.push(args[i]);
    }
  }
  return { question: words.join(' '), datasetPath };
}

async function main() {
  const { question, datasetPath } = parseArgs(process.argv.slice(2));

  let executor: QueryExecutor;
  if (datasetPath) {
    const dataset = await loadDatasetFile(datasetPath);
    logger.info(`📦 Loaded ${dataset.videos.length} videos and ${dataset.snapshots.length} snapshots from ${datasetPath}`);
    executor = new InMemoryQueryExecutor(dataset);
  } else {
    await initializeDatabase();
    executor = new PostgresQueryExecutor(AppDataSource);
  }

  try {
    const service = new AnalyticsAnswerService({ producers: buildProducers(env.llm), executor });
    const value = await service.answer(question);
    process.stdout.write(`${formatReply(value)}\n`);
  } finally {
    if (!datasetPath) {
      await closeDatabase();
    }
  }
}

main().catch((error) => {
  logger.error('❌ ask failed:', error);
  process.stdout.write('0\n');
  process.exitCode = 1;
});
