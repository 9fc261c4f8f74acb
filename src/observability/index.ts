export {
  ConsoleLogger,
  NoopLogger,
  errorContext,
  type LogContext,
  type LogLevel,
  type Logger,
} from './logging.js';
