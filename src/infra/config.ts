import { z } from 'zod';
import { ValidationError } from './errors';
import { DEFAULT_ASK_TIMEOUT_MS } from './actor';
import type { LogLevel } from './logger';
import { DEFAULT_PRICE_PER_HOUR_CENTS } from '../services/halfHourFeeCalculator';

const ConfigSchema = z.object({
  ASK_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_ASK_TIMEOUT_MS),
  PRICE_PER_HOUR_CENTS: z.coerce.number().int().nonnegative().default(DEFAULT_PRICE_PER_HOUR_CENTS),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  NODE_ENV: z.string().min(1).default('development'),
});

export interface AppConfig {
  askTimeoutMs: number;
  pricePerHourCents: number;
  logLevel: LogLevel;
  /** `production` switches log output to JSON lines. */
  nodeEnv: string;
}

function toAppConfig(data: z.output<typeof ConfigSchema>): AppConfig {
  return {
    askTimeoutMs: data.ASK_TIMEOUT_MS,
    pricePerHourCents: data.PRICE_PER_HOUR_CENTS,
    logLevel: data.LOG_LEVEL,
    nodeEnv: data.NODE_ENV,
  };
}

export const DEFAULT_CONFIG: AppConfig = toAppConfig(ConfigSchema.parse({}));

/**
 * Reads configuration from environment variables. Call dotenv's `config()`
 * first if values should come from a .env file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError('Invalid configuration', parsed.error.issues);
  }
  return toAppConfig(parsed.data);
}
