export { createLogger, LogContext, ContextAwareLogger, isLogLevel, winston } from './logger';
export type { LogLevel, LogSink } from './logger';
