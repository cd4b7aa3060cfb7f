export * from './entities';
export * from './value-objects';
export * from './errors';
export { FIELD_LIMITS, describeJsonType } from './validation';
