export type IoOperation = 'open' | 'stat' | 'read' | 'close';

export class TypeStatsIoError extends Error {
  public readonly code = 'IO_ERROR';
  public readonly offset: number;
  public readonly operation: IoOperation;
  public readonly path: string | undefined;

  constructor(options: {
    operation: IoOperation;
    offset: number;
    path?: string;
    message?: string;
    cause?: unknown;
  }) {
    const reason = options.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(
      options.message ??
        `Failed to ${options.operation} ${options.path ?? 'input'} at byte ${options.offset}${reason}`,
      options.cause !== undefined ? { cause: options.cause } : undefined
    );
    Object.setPrototypeOf(this, TypeStatsIoError.prototype);
    this.name = 'TypeStatsIoError';
    this.offset = options.offset;
    this.operation = options.operation;
    this.path = options.path;
  }
}

export class TypeStatsCancelledError extends Error {
  public readonly code = 'CANCELLED';
  public readonly offset: number;

  constructor(offset: number, message = 'Type stats run was cancelled') {
    super(message);
    Object.setPrototypeOf(this, TypeStatsCancelledError.prototype);
    this.name = 'TypeStatsCancelledError';
    this.offset = offset;
  }
}

/** Plain shape used to move errors across the worker boundary. */
export type SerializedScanError = Readonly<{
  name: string;
  message: string;
  code: string | null;
  offset: number | null;
  operation: IoOperation | null;
  path: string | null;
  causeMessage: string | null;
  causeCode: string | null;
}>;

function errorCode(value: unknown): string | null {
  if (typeof value === 'object' && value !== null && 'code' in value) {
    return typeof value.code === 'string' ? value.code : null;
  }
  return null;
}

export function serializeScanError(err: unknown): SerializedScanError {
  if (err instanceof TypeStatsIoError) {
    return {
      name: err.name,
      message: err.message,
      code: err.code,
      offset: err.offset,
      operation: err.operation,
      path: err.path ?? null,
      causeMessage: err.cause instanceof Error ? err.cause.message : null,
      causeCode: errorCode(err.cause),
    };
  }
  if (err instanceof TypeStatsCancelledError) {
    return {
      name: err.name,
      message: err.message,
      code: err.code,
      offset: err.offset,
      operation: null,
      path: null,
      causeMessage: null,
      causeCode: null,
    };
  }
  const error = err instanceof Error ? err : new Error(String(err));
  return {
    name: error.name,
    message: error.message,
    code: errorCode(error),
    offset: null,
    operation: null,
    path: null,
    causeMessage: null,
    causeCode: null,
  };
}

export function deserializeScanError(data: SerializedScanError): Error {
  if (data.code === 'IO_ERROR' && data.operation !== null) {
    const cause =
      data.causeMessage !== null
        ? Object.assign(new Error(data.causeMessage), data.causeCode ? { code: data.causeCode } : {})
        : undefined;
    return new TypeStatsIoError({
      operation: data.operation,
      offset: data.offset ?? 0,
      message: data.message,
      ...(data.path !== null ? { path: data.path } : {}),
      ...(cause ? { cause } : {}),
    });
  }
  if (data.code === 'CANCELLED') {
    return new TypeStatsCancelledError(data.offset ?? 0, data.message);
  }
  const error = new Error(data.message);
  error.name = data.name;
  return error;
}
