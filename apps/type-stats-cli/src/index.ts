export { parseArgs, USAGE, type ParsedArgs } from './args.js';
export { CliUsageError } from './errors.js';
export { formatJson, formatTable, sortRows, type ReportRow, type SortOrder } from './report/table.js';
export {
  EXIT_OK,
  EXIT_RUN_FAILED,
  EXIT_USAGE,
  runCli,
  type CliIo,
  type TextSink,
} from './run-cli.js';
