import { readFile } from 'node:fs/promises';
import * as path from 'node:path';

import { z } from 'zod';

import { MIN_WINDOW_BYTES } from './env.js';
import { ConfigError } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'type-stats.config.json';

export const ConfigFileSchema = z
  .object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
    inputFile: z.string().min(1, 'inputFile must not be empty').optional(),
    workerCount: z.number().int().min(1).optional(),
    windowBytes: z.number().int().min(MIN_WINDOW_BYTES).optional(),
    executor: z.enum(['threads', 'inline']).optional(),
  })
  .strict();

export type ConfigFileInput = z.infer<typeof ConfigFileSchema>;

export type LoadConfigFileParams = Readonly<{
  cwd: string;
  /** Explicit path (flag or env). When set, the file must exist. */
  explicitPath?: string;
}>;

export type LoadedConfigFile = Readonly<{
  path: string | null;
  values: ConfigFileInput;
}>;

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export async function loadConfigFile(params: LoadConfigFileParams): Promise<LoadedConfigFile> {
  const filePath = path.resolve(params.cwd, params.explicitPath ?? DEFAULT_CONFIG_FILE);

  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (err) {
    if (isNotFound(err) && params.explicitPath === undefined) {
      return { path: null, values: {} };
    }
    throw new ConfigError({
      message: `Cannot read config file ${filePath}`,
      source: filePath,
      cause: err,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError({
      message: `Config file ${filePath} is not valid JSON`,
      source: filePath,
      cause: err,
    });
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError({
      message: `Invalid config file ${filePath}: ${details}`,
      source: filePath,
    });
  }

  return { path: filePath, values: result.data };
}
