export { Logger, createLogger } from './logger';
