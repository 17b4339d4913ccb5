import {
  MIN_WINDOW_BYTES,
  parseExecutor,
  parsePositiveInt,
  type ConfigOverrides,
  type Executor,
} from '@app/config';

import { CliUsageError } from './errors.js';
import type { SortOrder } from './report/table.js';

export type ParsedArgs = Readonly<{
  help: boolean;
  json: boolean;
  sort: SortOrder;
  configPath: string | undefined;
  overrides: ConfigOverrides;
}>;

export const USAGE = `type-stats

Counts lines and bytes per "type" value in a JSONL file.

Usage:
  type-stats [input-file] [options]

Options:
  -w, --workers <n>        parallel range scans (default: available CPUs)
      --window-bytes <n>   read window per worker (default: 8388608, min: ${MIN_WINDOW_BYTES})
      --executor <name>    threads | inline (default: threads)
  -c, --config <path>      JSON config file (default: ./type-stats.config.json)
      --json               print the result as JSON
      --sort <order>       count | bytes | type (default: count)
  -h, --help               show this help
`;

function parseSort(value: string): SortOrder {
  if (value === 'count' || value === 'bytes' || value === 'type') return value;
  throw new CliUsageError(`Invalid --sort: ${value} (expected count|bytes|type)`);
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  let help = false;
  let json = false;
  let sort: SortOrder = 'count';
  let configPath: string | undefined;
  let inputFile: string | undefined;
  let workerCount: number | undefined;
  let windowBytes: number | undefined;
  let executor: Executor | undefined;

  const valueFor = (flag: string, index: number): string => {
    const value = argv[index];
    if (value === undefined || value.startsWith('-')) {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '--help':
      case '-h':
        help = true;
        break;
      case '--json':
        json = true;
        break;
      case '--workers':
      case '-w':
        workerCount = parsePositiveInt(arg, valueFor(arg, ++i), 1, 'flag');
        break;
      case '--window-bytes':
        windowBytes = parsePositiveInt(arg, valueFor(arg, ++i), MIN_WINDOW_BYTES, 'flag');
        break;
      case '--executor':
        executor = parseExecutor(valueFor(arg, ++i), 'flag');
        break;
      case '--config':
      case '-c':
        configPath = valueFor(arg, ++i);
        break;
      case '--sort':
        sort = parseSort(valueFor(arg, ++i));
        break;
      default: {
        if (arg.startsWith('-') && arg !== '-') {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        if (inputFile !== undefined) {
          throw new CliUsageError(`Unexpected argument: ${arg}`);
        }
        inputFile = arg;
      }
    }
    i++;
  }

  return {
    help,
    json,
    sort,
    configPath,
    overrides: {
      ...(inputFile !== undefined ? { inputFile } : {}),
      ...(workerCount !== undefined ? { workerCount } : {}),
      ...(windowBytes !== undefined ? { windowBytes } : {}),
      ...(executor !== undefined ? { executor } : {}),
    },
  };
}
