export type { Logger, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';
export { ConsoleLogger, ScopedLogger, formatPrefix } from './consoleLogger';
export { JsonlLogger } from './jsonlLogger';
