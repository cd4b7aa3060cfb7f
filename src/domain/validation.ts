import { isURL } from 'class-validator';
import { ValidationError } from './errors';

/**
 * Server-side limits of the Code Insights API. Values past these are
 * rejected by Bitbucket, so they are rejected here at construction.
 */
export const FIELD_LIMITS = {
  reportTitle: 450,
  reportDetails: 2000,
  reportReporter: 450,
  reportDataFields: 6,
  annotationMessage: 2000,
  annotationExternalId: 450,
  annotationsPerRequest: 1000,
} as const;

export function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function requireText(field: string, value: string, limit?: number): string {
  if (value.trim().length === 0) {
    throw new ValidationError(field, 'must not be empty');
  }
  return checkLength(field, value, limit);
}

export function optionalText(field: string, value: string | undefined, limit: number): string | undefined {
  return value === undefined ? undefined : checkLength(field, value, limit);
}

export function optionalUrl(field: string, value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  requireUrl(field, value);
  return value;
}

export function requireUrl(field: string, value: string): string {
  const valid = isURL(value, {
    protocols: ['http', 'https'],
    require_protocol: true,
    require_tld: false,
  });
  if (!valid) {
    throw new ValidationError(field, `must be an http or https URL, got "${value}"`);
  }
  return value;
}

export function requirePositiveInteger(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(field, `must be a positive integer, got ${value}`);
  }
  return value;
}

export function requireNonNegativeInteger(field: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(field, `must be a non-negative integer, got ${value}`);
  }
  return value;
}

export function optionalDate(field: string, value: Date | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const time = value.getTime();
  if (Number.isNaN(time)) {
    throw new ValidationError(field, 'must be a valid date');
  }
  if (time < 0) {
    throw new ValidationError(field, 'must not be before the epoch');
  }
  return new Date(time);
}

function checkLength(field: string, value: string, limit?: number): string {
  if (limit === undefined) return value;
  // Limits are in characters; count code points, not UTF-16 units
  const length = [...value].length;
  if (length > limit) {
    throw new ValidationError(field, `length ${length} is longer than the allowed limit ${limit}`);
  }
  return value;
}
