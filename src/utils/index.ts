export { config } from './config';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
