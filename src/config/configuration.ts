// Centralized, typed configuration for the classifier API
// Export a default factory so ConfigModule.load can consume it.
import type { LogLevel } from '@nestjs/common';

export interface ModelConfig {
  dir: string;
  manifest: string;
  expectedClasses: string[];
  loadOnStartup: boolean;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;

  model: ModelConfig;

  predict: {
    timeoutMs: number;
  };

  upload: {
    maxBytes: number;
    maxFiles: number;
  };

  requestLog: {
    // '-' writes to stdout
    path: string;
  };

  metrics: {
    prefix: string;
  };
}

const LOG_LEVELS: readonly LogLevel[] = [
  'verbose',
  'debug',
  'log',
  'warn',
  'error',
  'fatal',
];

/** Every level at or above `level`, in the order Nest's logger expects. */
export function logLevelsFrom(level: LogLevel): LogLevel[] {
  const idx = LOG_LEVELS.indexOf(level);
  return LOG_LEVELS.slice(idx < 0 ? 2 : idx);
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const found = LOG_LEVELS.find((l) => l === raw);
  return found ?? 'log';
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(raw.toLowerCase());
}

function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (!raw) return fallback;
  const items = raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return items.length ? items : fallback;
}

export default (): AppConfig => ({
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: parseInt(process.env.PORT ?? '8000', 10),
  logLevel: parseLogLevel(process.env.LOG_LEVEL),

  model: {
    dir: process.env.MODEL_DIR ?? 'models/current',
    manifest: process.env.MODEL_MANIFEST ?? 'model.json',
    // class order the artifact must declare; anything else fails the load
    expectedClasses: parseList(process.env.MODEL_EXPECTED_CLASSES, [
      'cat',
      'dog',
    ]),
    loadOnStartup: parseBool(process.env.MODEL_LOAD_ON_STARTUP, true),
  },

  predict: {
    timeoutMs: parseInt(process.env.PREDICT_TIMEOUT_MS ?? '10000', 10),
  },

  upload: {
    maxBytes: parseInt(
      process.env.UPLOAD_MAX_BYTES ?? String(10 * 1024 * 1024),
      10,
    ),
    maxFiles: parseInt(process.env.UPLOAD_MAX_FILES ?? '16', 10),
  },

  requestLog: {
    path: process.env.REQUEST_LOG_PATH ?? 'logs/requests.jsonl',
  },

  metrics: {
    prefix: process.env.METRICS_PREFIX ?? 'classifier_',
  },
});
