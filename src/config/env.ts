import dotenv from 'dotenv';
import Joi from 'joi';

// Load environment variables
dotenv.config();

interface EnvVars {
  DB_HOST: string;
  DB_PORT: number;
  DB_NAME: string;
  DB_USERNAME: string;
  DB_PASSWORD: string;
  DB_POOL_SIZE: number;
  DB_STATEMENT_TIMEOUT_MS: number;
  DB_LOGGING: boolean;
  API_HOST: string;
  API_PORT: number;
  NODE_ENV: 'development' | 'production' | 'test';
  LLM_ENABLED: boolean;
  LLM_API_BASE: string;
  LLM_API_KEY: string;
  LLM_MODEL: string;
  LLM_TIMEOUT_MS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'debug';
  LOG_FILE: string;
}

// Define environment schema
const envSchema = Joi.object<EnvVars>({
  // Database
  DB_HOST: Joi.string().default('localhost'),
  DB_PORT: Joi.number().port().default(5432),
  DB_NAME: Joi.string().default('video_metrics'),
  DB_USERNAME: Joi.string().default('postgres'),
  DB_PASSWORD: Joi.string().allow('').default(''),
  DB_POOL_SIZE: Joi.number().integer().min(1).default(10),
  DB_STATEMENT_TIMEOUT_MS: Joi.number().integer().min(1).default(10000),
  DB_LOGGING: Joi.boolean().default(false),

  // API
  API_HOST: Joi.string().default('0.0.0.0'),
  API_PORT: Joi.number().port().default(8000),
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),

  // Optional LLM intent producer
  LLM_ENABLED: Joi.boolean().default(false),
  LLM_API_BASE: Joi.string().uri().default('https://api.openai.com/v1'),
  LLM_API_KEY: Joi.string().allow('').default('').when('LLM_ENABLED', {
    is: true,
    then: Joi.string().required(),
  }),
  LLM_MODEL: Joi.string().default('gpt-4o-mini'),
  LLM_TIMEOUT_MS: Joi.number().integer().min(1).default(10000),

  // Logging
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug').default('info'),
  LOG_FILE: Joi.string().default('./logs/app.log'),
}).unknown();

// Validate environment variables
const { error, value: envVars } = envSchema.validate(process.env);

if (error) {
  throw new Error(`Config validation error: ${error.message}`);
}

// Export typed environment configuration
export const env = {
  // Database
  database: {
    host: envVars.DB_HOST,
    port: envVars.DB_PORT,
    name: envVars.DB_NAME,
    username: envVars.DB_USERNAME,
    password: envVars.DB_PASSWORD,
    poolSize: envVars.DB_POOL_SIZE,
    statementTimeoutMs: envVars.DB_STATEMENT_TIMEOUT_MS,
    logging: envVars.DB_LOGGING,
  },

  // API
  api: {
    host: envVars.API_HOST,
    port: envVars.API_PORT,
    nodeEnv: envVars.NODE_ENV,
  },

  // LLM intent producer (disabled unless LLM_ENABLED=true)
  llm: {
    enabled: envVars.LLM_ENABLED,
    apiBase: envVars.LLM_API_BASE,
    apiKey: envVars.LLM_API_KEY,
    model: envVars.LLM_MODEL,
    timeoutMs: envVars.LLM_TIMEOUT_MS,
  },

  // Logging
  logging: {
    level: envVars.LOG_LEVEL,
    file: envVars.LOG_FILE,
  },
} as const;

export type LlmSettings = typeof env.llm;
