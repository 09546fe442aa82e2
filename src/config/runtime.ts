import { isLogLevel } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';
import { DEFAULT_HISTORY_LIMIT } from '../scheduler/scheduler.js';

export interface RuntimeConfig {
  port: number;
  pollIntervalMs: number;
  controllersFile: string;
  emitterUrl?: string;
  historyLimit: number;
  logLevel: LogLevel;
}

export function getRuntimeConfig(): RuntimeConfig {
  const logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

  return {
    port: parseInt(process.env.PORT || '3001', 10),
    pollIntervalMs: positiveInt(process.env.POLL_INTERVAL_MS, 1000),
    controllersFile: process.env.CONTROLLERS_FILE || 'controllers.json',
    emitterUrl: process.env.EMITTER_URL || undefined,
    historyLimit: positiveInt(process.env.HISTORY_LIMIT, DEFAULT_HISTORY_LIMIT),
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
}

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = value ? parseInt(value, 10) : NaN;
  return Number.isNaN(parsed) || parsed <= 0 ? fallback : parsed;
}
