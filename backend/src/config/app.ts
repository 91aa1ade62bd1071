import { z } from 'zod';
import { config as loadEnv } from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

loadEnv();

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : !/^(false|0|no|off)$/i.test(value.trim())));

const envSchema = z.object({
  PROJECT_NAME: z.string().default('logscope'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8787),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  MODEL_NAME: z.string().default('gpt-4o-mini'),
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  MODEL_MAX_TOKENS: z.coerce.number().int().positive().default(4096),

  LOG_STORE_ENDPOINT: z.string().url().optional(),
  LOG_STORE_API_KEY: z.string().optional(),
  REMOTE_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  REMOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  CACHE_DIR: z.string().default('./data/cache'),
  CACHE_MAX_SIZE_MB: z.coerce.number().positive().default(100),
  CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  CACHE_RECENCY_FLOOR_MS: z.coerce.number().int().min(0).default(1000),
  CACHE_HISTORICAL_AGE_HOURS: z.coerce.number().positive().default(24),

  MAX_TOOL_ITERATIONS: z.coerce.number().int().positive().default(10),
  MAX_RETRY_ATTEMPTS: z.coerce.number().int().min(0).default(3),
  TIME_EXPANSION_FACTOR: z.coerce.number().gt(1).default(4),
  AUTO_RETRY_ENABLED: booleanFlag.default(true),
  INTENT_DETECTION_ENABLED: booleanFlag.default(true),
  TOOL_ITEM_CAP: z.coerce.number().int().positive().default(100),
  MAX_RESULT_TOKENS: z.coerce.number().int().positive().default(8000),
  MAX_HISTORY_TOKENS: z.coerce.number().int().positive().default(60000),
  RESULT_ARCHIVE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  RESULT_ARCHIVE_MAX_ENTRIES: z.coerce.number().int().positive().default(200),
  CONVERSATION_IDLE_MINUTES: z.coerce.number().positive().default(60),
  PII_SANITIZATION_ENABLED: booleanFlag.default(true),
  GROUP_CATALOG_ENABLED: booleanFlag.default(true),

  CORS_ORIGIN: z.string().default('http://localhost:5173'),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(30),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  OTEL_SERVICE_NAME: z.string().default('logscope'),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional(),
  ENABLE_CONSOLE_TRACING: booleanFlag.default(false)
});

export type AppConfig = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export type RuntimeConfig = AppConfig & { LOG_STORE_ENDPOINT: string };

/**
 * Checks the settings a live server needs but tests do not: the model
 * credentials and the log store endpoint.
 */
export function assertRuntimeConfig(appConfig: AppConfig): RuntimeConfig {
  const missing: string[] = [];
  if (!appConfig.OPENAI_API_KEY && !appConfig.OPENAI_BASE_URL) {
    missing.push('OPENAI_API_KEY (or OPENAI_BASE_URL for a keyless compatible endpoint)');
  }
  const endpoint = appConfig.LOG_STORE_ENDPOINT;
  if (!endpoint) {
    missing.push('LOG_STORE_ENDPOINT');
  }
  if (missing.length || !endpoint) {
    throw new ConfigurationError(`Missing required configuration: ${missing.join(', ')}`);
  }
  return { ...appConfig, LOG_STORE_ENDPOINT: endpoint };
}

export const config = parseConfig(process.env);
export const isDevelopment = config.NODE_ENV === 'development';
export const isProduction = config.NODE_ENV === 'production';
export const isTest = config.NODE_ENV === 'test';
