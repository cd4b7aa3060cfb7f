export type SchemaErrorKind =
  | 'missing'
  | 'wrong-type'
  | 'unrecognized-enum-token'
  | 'type-mismatch'
  | 'invalid-value'
  | 'invalid-json';

/**
 * Raised while reading an incoming JSON document that does not match the
 * wire schema. `field` is the path of the offending key, e.g. `data[0].value`.
 */
export class SchemaError extends Error {
  constructor(
    readonly field: string,
    readonly kind: SchemaErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${field}: ${message}`, options);
    this.name = 'SchemaError';
  }
}
