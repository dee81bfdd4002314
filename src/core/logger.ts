/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('tools/system_cleaner');
 *
 * Child loggers are scoped with a `module` field so audit logs
 * can be filtered per-module. Output goes to stderr: under the stdio
 * transport stdout carries JSON-RPC frames only.
 */

import pino from 'pino';
import { LogLevel, SessionConfig } from './types';

let instance: pino.Logger | null = null;

// Children are created at import time, before initLogger runs, and pino
// children do not follow later level changes on their parent.
const children: pino.Logger[] = [];

function createRoot(level: LogLevel | 'silent'): pino.Logger {
  return pino({ level }, pino.destination(2));
}

function envLevel(): LogLevel {
  const raw = process.env.PC_TOOLKIT_LOG_LEVEL;
  switch (raw) {
    case 'trace': case 'debug': case 'info': case 'warn': case 'error': case 'fatal':
      return raw;
    default:
      return 'info';
  }
}

export function initLogger(config: SessionConfig): pino.Logger {
  const level = config.logLevel ?? 'info';
  const root = getLogger();
  root.level = level;
  for (const child of children) child.level = level;
  return root;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for early imports before initLogger is called
    instance = createRoot(envLevel());
  }
  return instance;
}

/**
 * Returns a child logger scoped to a specific module.
 * Usage:  const log = scopedLogger('tools/system_info');
 */
export function scopedLogger(moduleName: string): pino.Logger {
  const child = getLogger().child({ module: moduleName });
  children.push(child);
  return child;
}
