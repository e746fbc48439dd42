import dotenv from 'dotenv';
import process from 'node:process';
import { z } from 'zod';

import { DEFAULT_ALERT_THRESHOLD } from './domain/types.js';

const intFrom = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: intFrom(8787),
  DATABASE_PATH: z.string().min(1).default('data/budget.db'),
  ALERT_THRESHOLD: z.coerce.number().positive().default(DEFAULT_ALERT_THRESHOLD),
  ALERT_SWEEP_INTERVAL_HOURS: z.coerce.number().positive().default(6),
  ALERT_COOLDOWN_HOURS: z.coerce.number().nonnegative().default(0),
  MAX_PAGE_SIZE: intFrom(200),
  SCHEDULER_TICK_SECONDS: intFrom(60),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface AppConfig {
  port: number;
  databasePath: string;
  alertThreshold: number;
  alertSweepIntervalMs: number;
  alertCooldownMs: number;
  maxPageSize: number;
  schedulerTickMs: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Parses configuration from an environment map.
 * Throws a ZodError listing every invalid variable.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    databasePath: parsed.DATABASE_PATH,
    alertThreshold: parsed.ALERT_THRESHOLD,
    alertSweepIntervalMs: parsed.ALERT_SWEEP_INTERVAL_HOURS * HOUR_MS,
    alertCooldownMs: parsed.ALERT_COOLDOWN_HOURS * HOUR_MS,
    maxPageSize: parsed.MAX_PAGE_SIZE,
    schedulerTickMs: parsed.SCHEDULER_TICK_SECONDS * 1000,
    logLevel: parsed.LOG_LEVEL,
  };
}

/** Loads .env into process.env, then parses it */
export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
