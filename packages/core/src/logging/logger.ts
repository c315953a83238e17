/**
 * Logger
 *
 * Console logging with `[Component]` prefixes. Debug lines only print
 * in verbose mode.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger for a sub-component, e.g. `[Gateway:Cache]` */
  child(component: string): Logger;
}

export interface ConsoleLoggerOptions {
  /** Print debug lines */
  verbose?: boolean;
  /** Component name shown in brackets */
  prefix?: string;
}

function formatLine(prefix: string | undefined, message: string, context?: LogContext): string {
  const head = prefix ? `[${prefix}] ${message}` : message;
  if (!context || Object.keys(context).length === 0) {
    return head;
  }
  return `${head} ${JSON.stringify(context)}`;
}

/**
 * Create a logger that writes to the console.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { verbose = false, prefix } = options;

  return {
    debug(message, context) {
      if (verbose) {
        console.log(formatLine(prefix, message, context));
      }
    },
    info(message, context) {
      console.log(formatLine(prefix, message, context));
    },
    warn(message, context) {
      console.warn(formatLine(prefix, message, context));
    },
    error(message, context) {
      console.error(formatLine(prefix, message, context));
    },
    child(component) {
      return createConsoleLogger({
        verbose,
        prefix: prefix ? `${prefix}:${component}` : component,
      });
    },
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};

export interface MemoryLogRecord {
  level: LogLevel;
  component?: string;
  message: string;
  context?: LogContext;
}

export interface MemoryLogger extends Logger {
  readonly records: MemoryLogRecord[];
}

/**
 * Logger that keeps records in memory. Children share the parent's records.
 */
export function createMemoryLogger(component?: string, records: MemoryLogRecord[] = []): MemoryLogger {
  const push = (level: LogLevel) => (message: string, context?: LogContext) => {
    records.push({ level, component, message, context });
  };

  return {
    records,
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    child(name) {
      return createMemoryLogger(component ? `${component}:${name}` : name, records);
    },
  };
}
