import * as path from 'node:path';

import {
  ConfigError,
  loadConfigFile,
  loadEnv,
  resolveConfig,
  type EnvSource,
  type TypeStatsConfig,
} from '@app/config';
import { createLogger } from '@app/logger';
import { runTypeStats } from '@app/type-stats';

import { parseArgs, USAGE, type ParsedArgs } from './args.js';
import { CliUsageError } from './errors.js';
import { formatJson, formatTable } from './report/table.js';

export const EXIT_OK = 0;
export const EXIT_RUN_FAILED = 1;
export const EXIT_USAGE = 2;

export type TextSink = {
  write(chunk: string): unknown;
};

export type CliIo = Readonly<{
  env: EnvSource;
  cwd: string;
  stdout: TextSink;
  /** Receives error messages and the JSON log lines. */
  stderr: TextSink;
  signal?: AbortSignal;
}>;

function isUsageProblem(err: unknown): err is CliUsageError | ConfigError {
  return err instanceof CliUsageError || err instanceof ConfigError;
}

/** Runs one invocation and returns its exit code; never calls process.exit. */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (!isUsageProblem(err)) throw err;
    io.stderr.write(`error: ${err.message}\nRun with --help for usage.\n`);
    return EXIT_USAGE;
  }

  if (args.help) {
    io.stdout.write(USAGE);
    return EXIT_OK;
  }

  let config: TypeStatsConfig;
  try {
    const env = loadEnv(io.env);
    const explicitPath = args.configPath ?? env.configPath;
    const file = await loadConfigFile({
      cwd: io.cwd,
      ...(explicitPath !== undefined ? { explicitPath } : {}),
    });
    config = resolveConfig({ file: file.values, env, flags: args.overrides });
  } catch (err) {
    if (!isUsageProblem(err)) throw err;
    io.stderr.write(`error: ${err.message}\n`);
    return EXIT_USAGE;
  }

  const logger = createLogger({
    service: 'type-stats',
    env: config.nodeEnv,
    level: config.logLevel,
    destination: io.stderr,
  });

  const filePath = path.resolve(io.cwd, config.inputFile);
  try {
    const result = await runTypeStats({
      filePath,
      workerCount: config.workerCount,
      windowBytes: config.windowBytes,
      executor: config.executor,
      logger,
      ...(io.signal !== undefined ? { signal: io.signal } : {}),
    });
    io.stdout.write(args.json ? formatJson(result, args.sort) : formatTable(result, args.sort));
    return EXIT_OK;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.stderr.write(`error: ${message}\n`);
    return EXIT_RUN_FAILED;
  }
}
