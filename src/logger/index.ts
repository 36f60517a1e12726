import { EventEmitter } from 'node:events';
import pino from 'pino';
import type { Logger } from 'pino';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import { RingBuffer } from './ring-buffer.js';
import type { LogEntry, LogLevel, LogSink } from '../types/index.js';

const DEFAULT_RING_BUFFER_SIZE = 1000;

/**
 * Subset of the SonicBoom interface used by the logger.
 * Avoids importing sonic-boom directly while maintaining type safety.
 */
interface SonicBoomDest {
  flushSync(): void;
  once(event: string, listener: () => void): void;
  removeAllListeners(event: string): void;
  destroyed?: boolean;
}

/** Wait for a pino destination to become ready, then flushSync. */
function waitForReadyAndFlush(dest: SonicBoomDest): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (dest.destroyed) {
      resolve();
      return;
    }
    // SonicBoom fires 'ready' once the file descriptor is open
    dest.once('ready', () => {
      try {
        dest.flushSync();
        resolve();
      } catch (err) {
        reject(err as Error);
      }
    });
    try {
      dest.flushSync();
      dest.removeAllListeners('ready');
      resolve();
    } catch {
      // Not ready yet -- the 'ready' listener above will handle it.
    }
  });
}

export interface TriageLoggerOptions {
  /** NDJSON log file. Without one, pino output is disabled. */
  logFile?: string;
  /** Minimum level written to the log file. */
  level?: LogLevel;
  ringBufferSize?: number;
}

/**
 * Structured logger: pino for the optional JSON log file, plus an in-memory
 * ring buffer of recent entries and an 'entry' event per log call so the CLI
 * can echo warnings to the terminal.
 *
 * The ring buffer and the event see every entry regardless of `level`.
 */
export class TriageLogger extends EventEmitter implements LogSink {
  private readonly logger: Logger;
  private readonly destination: SonicBoomDest | null;
  private readonly ringBuffer: RingBuffer<LogEntry>;

  constructor(options: TriageLoggerOptions = {}) {
    super();
    this.ringBuffer = new RingBuffer<LogEntry>(options.ringBufferSize ?? DEFAULT_RING_BUFFER_SIZE);
    const level = options.level ?? 'info';

    if (options.logFile) {
      // pino.destination does not create directories
      mkdirSync(dirname(options.logFile), { recursive: true });
      const dest = pino.destination({ dest: options.logFile, sync: false });
      this.destination = dest as unknown as SonicBoomDest;
      this.logger = pino({ level, timestamp: pino.stdTimeFunctions.isoTime }, dest);
    } else {
      this.destination = null;
      this.logger = pino({ enabled: false });
    }
  }

  /**
   * Log a message at the given level.
   *
   * Pushes a LogEntry to the ring buffer, emits it, then forwards to pino.
   */
  log(
    level: LogLevel,
    component: string,
    message: string,
    meta?: Record<string, unknown>,
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      meta,
    };

    this.ringBuffer.push(entry);
    this.emit('entry', entry);
    this.logger[level]({ component, ...meta }, message);
  }

  /** Recent log entries, oldest first. */
  getRecentEntries(): LogEntry[] {
    return this.ringBuffer.toArray();
  }

  /** Flush pino's async SonicBoom destination before exit. */
  async flush(): Promise<void> {
    if (!this.destination) return;
    await waitForReadyAndFlush(this.destination);
  }
}
