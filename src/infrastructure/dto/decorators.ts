import { ValidateIf } from 'class-validator';

/**
 * Marks a key that may be left out of a document. Unlike `IsOptional`,
 * an explicit `null` is still validated (and rejected): the API treats a
 * null value differently from an absent key.
 */
export function OptionalKey(): PropertyDecorator {
  return ValidateIf((_object: object, value: unknown) => value !== undefined);
}
