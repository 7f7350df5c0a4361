export class FieldAccessError extends Error {
  override readonly name = 'FieldAccessError';

  constructor(
    readonly field: string,
    override readonly cause?: unknown,
    message?: string,
  ) {
    super(message ?? `Failed to read field "${field}": ${String(cause)}`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class CacheError extends Error {
  override readonly name = 'CacheError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
