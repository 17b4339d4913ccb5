/** Bad command line: unknown flag, missing value, bad enum. Exits 2. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, CliUsageError.prototype);
    this.name = 'CliUsageError';
  }
}
