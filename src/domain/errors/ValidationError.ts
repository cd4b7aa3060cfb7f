/**
 * Raised by entity and value-object factories when a field violates a
 * structural constraint. Never raised after construction.
 */
export class ValidationError extends Error {
  constructor(
    readonly field: string,
    readonly reason: string,
  ) {
    super(`${field}: ${reason}`);
    this.name = 'ValidationError';
  }
}
