export * from './dto';
export * from './serialization';
export { createLogger, Logger } from './logging';
