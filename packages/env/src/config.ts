import { DEFAULT_MAX_BATCH_SIZE, DEFAULT_TARGET_PREFIX, isValidBech32Prefix } from '@addrbridge/address-converter';
import { LOG_LEVELS, type LogLevel } from '@addrbridge/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const envSchema = z.object({
  ADDRBRIDGE_TARGET_PREFIX: z
    .string()
    .trim()
    .refine(isValidBech32Prefix, { message: 'Target prefix must be lowercase letters only' })
    .default(DEFAULT_TARGET_PREFIX),
  ADDRBRIDGE_MAX_BATCH_SIZE: z.coerce
    .number()
    .int({ message: 'Batch size must be an integer' })
    .min(1, { message: 'Batch size must be at least 1' })
    .max(1000, { message: 'Batch size must not exceed 1000' })
    .default(DEFAULT_MAX_BATCH_SIZE),
  ADDRBRIDGE_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export interface AppConfig {
  logLevel: LogLevel;
  maxBatchSize: number;
  nodeEnv: 'development' | 'production' | 'test';
  targetPrefix: string;
}

let cachedConfig: AppConfig | undefined;

/**
 * Validate an environment map into application config.
 * Does not touch the cache; use getAppConfig() for process-wide access.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): Result<AppConfig, Error> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    return err(new Error(`Environment validation failed:\n${issues}`));
  }

  return ok({
    logLevel: result.data.ADDRBRIDGE_LOG_LEVEL,
    maxBatchSize: result.data.ADDRBRIDGE_MAX_BATCH_SIZE,
    nodeEnv: result.data.NODE_ENV,
    targetPrefix: result.data.ADDRBRIDGE_TARGET_PREFIX,
  });
}

/**
 * Validates process.env on first access and caches the result.
 */
export function getAppConfig(): Result<AppConfig, Error> {
  if (cachedConfig) {
    return ok(cachedConfig);
  }

  return loadAppConfig().map((config) => {
    cachedConfig = config;
    return config;
  });
}

/** Clear the cached config. Intended for tests. */
export function resetAppConfig(): void {
  cachedConfig = undefined;
}

export function getNodeEnv(): AppConfig['nodeEnv'] {
  return getAppConfig()
    .map((config) => config.nodeEnv)
    .unwrapOr('development');
}

export function isDevelopment(): boolean {
  return getNodeEnv() === 'development';
}
