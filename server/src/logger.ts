import { createConsola, type ConsolaInstance } from 'consola';
import process from 'node:process';

/**
 * Default logger instance with standard configuration
 */
export const logger = createConsola({
  level: process.env.LOG_LEVEL === 'debug' ? 5 : 3,
});

// Tagged children copy the level when created, so keep them for setLogLevel
const tagged: ConsolaInstance[] = [];

/**
 * Creates a named logger for a specific module or component
 */
export function createLogger(name: string): ConsolaInstance {
  const child = logger.withTag(name);
  tagged.push(child);
  return child;
}

const LEVELS = { error: 0, warn: 1, info: 3, debug: 5 } as const;

/** Applies a configured level name after .env has been loaded */
export function setLogLevel(level: keyof typeof LEVELS): void {
  for (const instance of [logger, ...tagged]) {
    instance.level = LEVELS[level];
  }
}
