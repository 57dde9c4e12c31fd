/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('core/registry');
 *
 * Logs go to stderr: the stdio transport owns stdout.
 */

import pino from 'pino';
import { ServerConfig } from './types';

let instance: pino.Logger | null = null;

/** Child loggers are created at import time; initLogger re-levels them. */
const children: pino.Logger[] = [];

export function getLogger(): pino.Logger {
  if (!instance) {
    instance = pino(
      { level: process.env.MCP_LOG_LEVEL ?? 'info' },
      pino.destination({ dest: 2, sync: true })
    );
  }
  return instance;
}

export function initLogger(config: Pick<ServerConfig, 'logLevel'>): pino.Logger {
  const root = getLogger();
  root.level = config.logLevel;
  for (const child of children) {
    child.level = config.logLevel;
  }
  return root;
}

/**
 * Returns a child logger scoped to a specific module.
 * Usage:  const log = scopedLogger('transports/sse');
 */
export function scopedLogger(moduleName: string): pino.Logger {
  const child = getLogger().child({ module: moduleName });
  children.push(child);
  return child;
}
