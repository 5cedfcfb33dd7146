import { ConsoleLogger, SilentLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';

export type { Logger, LogLevel, MaybePromise } from './types';
export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger, SilentLogger };
