export class ConfigError extends Error {
  public readonly source: string;

  constructor(options: { message: string; source: string; cause?: unknown }) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    Object.setPrototypeOf(this, ConfigError.prototype);
    this.name = 'ConfigError';
    this.source = options.source;
  }
}
