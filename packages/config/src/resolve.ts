import * as os from 'node:os';

import type { ConfigFileInput } from './config-file.js';
import type { EnvOverrides, Executor, LogLevel, NodeEnv } from './env.js';

export const DEFAULT_INPUT_FILE = 'small.log';
export const DEFAULT_WINDOW_BYTES = 8 * 1024 * 1024;

export type TypeStatsConfig = Readonly<{
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  inputFile: string;
  workerCount: number;
  windowBytes: number;
  executor: Executor;
}>;

export type ConfigOverrides = Readonly<{
  logLevel?: LogLevel;
  inputFile?: string;
  workerCount?: number;
  windowBytes?: number;
  executor?: Executor;
}>;

export function defaultWorkerCount(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Layers configuration sources: defaults < config file < env < flags.
 */
export function resolveConfig(layers: {
  file?: ConfigFileInput;
  env?: EnvOverrides;
  flags?: ConfigOverrides;
}): TypeStatsConfig {
  const file = layers.file ?? {};
  const env = layers.env ?? {};
  const flags = layers.flags ?? {};

  return {
    nodeEnv: env.nodeEnv ?? 'production',
    logLevel: flags.logLevel ?? env.logLevel ?? file.logLevel ?? 'info',
    inputFile: flags.inputFile ?? env.inputFile ?? file.inputFile ?? DEFAULT_INPUT_FILE,
    workerCount: flags.workerCount ?? env.workerCount ?? file.workerCount ?? defaultWorkerCount(),
    windowBytes: flags.windowBytes ?? env.windowBytes ?? file.windowBytes ?? DEFAULT_WINDOW_BYTES,
    executor: flags.executor ?? env.executor ?? file.executor ?? 'threads',
  };
}
