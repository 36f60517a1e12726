// Log type definitions

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  meta?: Record<string, unknown>;
}

/** The slice of the logger that library code depends on. */
export interface LogSink {
  log(
    level: LogLevel,
    component: string,
    message: string,
    meta?: Record<string, unknown>,
  ): void;
}
