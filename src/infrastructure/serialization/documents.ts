import { validateSync, ValidationError as ConstraintViolation } from 'class-validator';
import { describeJsonType, SchemaError, ValidationError } from '../../domain';

export function joinPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy the known keys of a parsed document onto a fresh DTO instance and
 * run its class-validator constraints. Unknown keys are ignored.
 */
export function readDto<T extends object>(
  Dto: new () => T,
  document: unknown,
  keys: readonly string[],
  path: string,
): T {
  if (!isJsonObject(document)) {
    throw new SchemaError(
      path || '$',
      'wrong-type',
      `expected an object, got ${describeJsonType(document)}`,
    );
  }

  const source = document;
  const known = Object.fromEntries(
    keys.filter((key) => Object.prototype.hasOwnProperty.call(source, key)).map((key) => [key, source[key]]),
  );
  const dto = Object.assign(new Dto(), known);

  const violations = validateSync(dto);
  if (violations.length > 0) {
    throw toSchemaError(violations[0], path);
  }
  return dto;
}

/**
 * Run an entity factory, reporting its ValidationError as a SchemaError
 * against the document path.
 */
export function build<T>(path: string, factory: () => T): T {
  try {
    return factory();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new SchemaError(joinPath(path, error.field), 'invalid-value', error.reason, { cause: error });
    }
    throw error;
  }
}

function toSchemaError(violation: ConstraintViolation, path: string): SchemaError {
  const field = joinPath(path, violation.property);
  const value: unknown = violation.value;
  const constraints = violation.constraints ?? {};

  if (value === undefined) {
    return new SchemaError(field, 'missing', 'required key is missing');
  }
  if ('isEnum' in constraints && typeof value === 'string') {
    return new SchemaError(field, 'unrecognized-enum-token', `unrecognized token "${value}"`);
  }
  const expected = Object.values(constraints).join('; ');
  return new SchemaError(field, 'wrong-type', `${expected}, got ${describeJsonType(value)}`);
}
