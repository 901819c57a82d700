import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, MaybePromise } from './types';
export type { LogLevel, ConsoleLoggerOptions } from './consoleLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger };
