export {
  consoleLogger,
  noopLogger,
  createConsoleLogger,
  childLogger,
} from './ILogger';

export type { ILogger, LogLevel, LogMetadata, ConsoleLoggerOptions } from './ILogger';
