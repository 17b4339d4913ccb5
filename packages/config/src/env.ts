import { ConfigError } from './errors.js';

export type NodeEnv = 'development' | 'staging' | 'production' | 'test';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Executor = 'threads' | 'inline';

/**
 * Values read from the process environment. Every field is optional: absent
 * variables fall through to the config file and then to defaults.
 */
export type EnvOverrides = Readonly<{
  nodeEnv?: NodeEnv;
  logLevel?: LogLevel;
  inputFile?: string;
  workerCount?: number;
  windowBytes?: number;
  executor?: Executor;
  configPath?: string;
}>;

export type EnvSource = Record<string, string | undefined>;

export const MIN_WINDOW_BYTES = 64 * 1024;

function optionalString(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (value == null) return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export function parseNodeEnv(value: string): NodeEnv {
  const normalized = value.trim();
  if (
    normalized === 'development' ||
    normalized === 'staging' ||
    normalized === 'production' ||
    normalized === 'test'
  ) {
    return normalized;
  }
  throw new ConfigError({ message: `Invalid NODE_ENV: ${normalized}`, source: 'env' });
}

export function parseLogLevel(value: string, source = 'env'): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error' ||
    normalized === 'fatal'
  ) {
    return normalized;
  }
  throw new ConfigError({ message: `Invalid log level: ${value}`, source });
}

export function parseExecutor(value: string, source = 'env'): Executor {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'threads' || normalized === 'inline') return normalized;
  throw new ConfigError({ message: `Invalid executor: ${value} (expected threads|inline)`, source });
}

export function parsePositiveInt(name: string, raw: string, min = 1, source = 'env'): number {
  const trimmed = raw.trim();
  const value = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError({ message: `Invalid ${name}: ${raw} (expected integer >= ${min})`, source });
  }
  return value;
}

export function loadEnv(env: EnvSource = process.env): EnvOverrides {
  const nodeEnv = optionalString(env, 'NODE_ENV');
  const logLevel = optionalString(env, 'LOG_LEVEL');
  const inputFile = optionalString(env, 'TYPE_STATS_INPUT_FILE');
  const workers = optionalString(env, 'TYPE_STATS_WORKERS');
  const windowBytes = optionalString(env, 'TYPE_STATS_WINDOW_BYTES');
  const executor = optionalString(env, 'TYPE_STATS_EXECUTOR');
  const configPath = optionalString(env, 'TYPE_STATS_CONFIG');

  return {
    ...(nodeEnv !== undefined ? { nodeEnv: parseNodeEnv(nodeEnv) } : {}),
    ...(logLevel !== undefined ? { logLevel: parseLogLevel(logLevel) } : {}),
    ...(inputFile !== undefined ? { inputFile } : {}),
    ...(workers !== undefined
      ? { workerCount: parsePositiveInt('TYPE_STATS_WORKERS', workers) }
      : {}),
    ...(windowBytes !== undefined
      ? {
          windowBytes: parsePositiveInt('TYPE_STATS_WINDOW_BYTES', windowBytes, MIN_WINDOW_BYTES),
        }
      : {}),
    ...(executor !== undefined ? { executor: parseExecutor(executor) } : {}),
    ...(configPath !== undefined ? { configPath } : {}),
  };
}
