/**
 * Logging Module
 */

export type {
  Logger,
  LogLevel,
  LogContext,
  ConsoleLoggerOptions,
  MemoryLogRecord,
  MemoryLogger,
} from './logger.js';
export { createConsoleLogger, createMemoryLogger, silentLogger } from './logger.js';

export type { RequestLogEntry, RequestLogger, RequestLogSummary } from './request-logger.js';
export { ConsoleRequestLogger, InMemoryRequestLogger } from './request-logger.js';
