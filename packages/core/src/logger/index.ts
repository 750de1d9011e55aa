export { createLogger, getLogLevel, isLogLevel, logger, setLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
