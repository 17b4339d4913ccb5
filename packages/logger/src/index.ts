import { Writable } from 'node:stream';

import pino, { type DestinationStream, type Logger as PinoLogger } from 'pino';

import { getTraceContext } from './otel-correlation.js';

export { OTEL_ATTR } from './otel-attributes.js';
export {
  getTraceContext,
  setSpanAttributes,
  withSpan,
  type SpanAttributes,
  type TraceContext,
} from './otel-correlation.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LoggerEnv = 'development' | 'staging' | 'production' | 'test';

export type Logger = Readonly<{
  debug: (context: Record<string, unknown>, message: string) => void;
  info: (context: Record<string, unknown>, message: string) => void;
  warn: (context: Record<string, unknown>, message: string) => void;
  error: (context: Record<string, unknown>, message: string) => void;
  fatal: (context: Record<string, unknown>, message: string) => void;
  child: (baseContext: Record<string, unknown>) => Logger;
}>;

export type CreateLoggerOptions = Readonly<{
  service: string;
  env: LoggerEnv;
  level: LogLevel;
  version?: string;
  /** Defaults to stderr so stdout stays free for report output. */
  destination?: DestinationStream;
}>;

export function createLogger(options: CreateLoggerOptions): Logger {
  return createLoggerWrapper(createPinoLogger(options), {});
}

/** Logger that drops everything; for library callers that pass none. */
export function createSilentLogger(): Logger {
  const sink = new Writable({
    write(_chunk, _enc, cb) {
      cb();
    },
  });
  return createLogger({ service: 'silent', env: 'test', level: 'fatal', destination: sink });
}

function createPinoLogger(options: CreateLoggerOptions): PinoLogger {
  return pino(
    {
      level: options.level,
      messageKey: 'message',
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      base: {
        service: options.service,
        env: options.env,
        version: options.version ?? process.env['npm_package_version'] ?? '0.0.0',
      },
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    options.destination ?? pino.destination({ fd: 2, sync: true })
  );
}

function createLoggerWrapper(pinoLogger: PinoLogger, baseContext: Record<string, unknown>): Logger {
  const log = (level: LogLevel, context: Record<string, unknown>, message: string): void => {
    const merged = {
      ...baseContext,
      ...context,
      ...traceFields(),
    };

    const snake = toSnakeCaseDeep(merged);
    const fields = isRecord(snake) ? snake : {};

    switch (level) {
      case 'debug':
        pinoLogger.debug(fields, message);
        return;
      case 'info':
        pinoLogger.info(fields, message);
        return;
      case 'warn':
        pinoLogger.warn(fields, message);
        return;
      case 'error':
        pinoLogger.error(fields, message);
        return;
      case 'fatal':
        pinoLogger.fatal(fields, message);
        return;
    }
  };

  return {
    debug: (context, message) => log('debug', context, message),
    info: (context, message) => log('info', context, message),
    warn: (context, message) => log('warn', context, message),
    error: (context, message) => log('error', context, message),
    fatal: (context, message) => log('fatal', context, message),
    child: (ctx) => createLoggerWrapper(pinoLogger, { ...baseContext, ...ctx }),
  };
}

function traceFields(): Record<string, unknown> {
  const { traceId, spanId } = getTraceContext();
  if (!traceId || !spanId) return {};
  return { trace_id: traceId, span_id: spanId };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSnakeCaseDeep(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map(toSnakeCaseDeep);
  // pino's `err` serializer renders Error instances.
  if (value instanceof Error) return value;
  if (!isRecord(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    out[toSnakeKey(key)] = toSnakeCaseDeep(val);
  }
  return out;
}

export function toSnakeKey(key: string): string {
  // Preserve existing snake_case.
  if (key.includes('_')) return key.toLowerCase();

  // camelCase / PascalCase -> snake_case
  const withUnderscore = key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z0-9]+)/g, '$1_$2');
  return withUnderscore.toLowerCase();
}
