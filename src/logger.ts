export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  readonly debug: (message: string) => void;
  readonly info: (message: string) => void;
  readonly warn: (message: string) => void;
  readonly error: (message: string) => void;
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

let verbose = false;
let sink: LogSink = consoleSink;

/**
 * Enables or disables debug output for every scoped logger.
 */
export const setVerbose = (enabled: boolean): void => {
  verbose = enabled;
};

/**
 * Redirects log lines, e.g. through a progress bar container so bars are not torn.
 * Passing nothing restores console output.
 */
export const setLogSink = (next?: LogSink): void => {
  sink = next ?? consoleSink;
};

/**
 * Formats a single log line as `<timestamp> [scope] LEVEL message`.
 */
export const formatLogLine = (
  scope: string,
  level: LogLevel,
  message: string,
  now: Date = new Date(),
): string => `${now.toISOString()} [${scope}] ${level.toUpperCase()} ${message}`;

export const createLogger = (scope: string): Logger => {
  const emit = (level: LogLevel, message: string): void => {
    if (level === 'debug' && !verbose) {
      return;
    }
    sink(level, formatLogLine(scope, level, message));
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
};
