/**
 * File Logger
 * Appends debug lines to a log file; the terminal itself belongs to the UI
 */

import { createWriteStream } from 'fs';
import type { WriteStream } from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerOptions {
  name: string;
  level?: LogLevel;
  filePath?: string | null;
}

export function formatLogLine(date: Date, name: string, level: LogLevel, message: string): string {
  return `${date.toISOString()} - ${name} - ${level.toUpperCase()} - ${message}`;
}

export interface LogSink {
  stream: WriteStream | null;
  failed: boolean;
}

export class Logger {
  readonly name: string;
  readonly level: LogLevel;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions, sink?: LogSink) {
    this.name = options.name;
    this.level = options.level ?? 'info';
    this.sink = sink ?? { stream: null, failed: false };

    if (!sink && options.filePath) {
      const stream = createWriteStream(options.filePath, { flags: 'a', encoding: 'utf8' });
      // Write failures disable the logger
      stream.on('error', () => {
        this.sink.failed = true;
      });
      this.sink.stream = stream;
    }
  }

  static disabled(name: string = 'splitview'): Logger {
    return new Logger({ name, filePath: null });
  }

  get enabled(): boolean {
    return this.sink.stream !== null && !this.sink.failed;
  }

  /**
   * Logger writing to the same file under another name
   */
  child(name: string): Logger {
    return new Logger({ name, level: this.level }, this.sink);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  /**
   * Flush and close the underlying file. Children share the file, so closing
   * any of them closes all of them.
   */
  close(): Promise<void> {
    const stream = this.sink.stream;
    if (!stream) {
      return Promise.resolve();
    }
    this.sink.stream = null;
    if (this.sink.failed) {
      stream.destroy();
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      stream.end(() => resolve());
    });
  }

  private write(level: LogLevel, message: string): void {
    const stream = this.sink.stream;
    if (!stream || this.sink.failed || !this.isLevelEnabled(level)) {
      return;
    }
    stream.write(formatLogLine(new Date(), this.name, level, message) + '\n');
  }
}
