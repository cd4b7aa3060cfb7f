export { ValidationError } from './ValidationError';
export { SchemaError, SchemaErrorKind } from './SchemaError';
