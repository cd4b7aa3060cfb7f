import 'reflect-metadata';

export * from './domain';
export * from './infrastructure';
export { loadConfig, SchemaConfig } from './config';
