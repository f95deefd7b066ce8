import path from 'node:path';
import type { LogEntry, LogLevel, LogSink } from '../../infra/logger';
import { RotatingFileWriter } from './RotatingFileWriter';

const ALL_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface FileSinkOptions {
  levels?: LogLevel[];
  runId: string;
}

/** One log file, filtered by level. Multi-line messages are folded to one line. */
export class FileSink implements LogSink {
  readonly kind = 'file' as const;
  private readonly levels: Set<LogLevel>;
  private readonly runId: string;
  private readonly writer: RotatingFileWriter;

  constructor(writer: RotatingFileWriter, options: FileSinkOptions) {
    this.writer = writer;
    this.levels = new Set(options.levels ?? ALL_LEVELS);
    this.runId = options.runId;
  }

  get filePath(): string {
    return this.writer.filePath;
  }

  write(entry: LogEntry, _formatted?: string): void {
    if (!this.levels.has(entry.level)) return;
    const message = entry.message.replace(/\r?\n/g, '\\n');
    this.writer.write(`[${entry.iso}] ${entry.level.toUpperCase()} runId=${this.runId} ${message}`);
  }

  close(): void {
    this.writer.close();
  }
}

export interface StandardFileSinkOptions {
  logDir: string;
  runId: string;
  maxBytes: number;
  maxFiles: number;
}

/**
 * app.log gets everything at or above the logger level, warnings.log only WARN,
 * errors.log only ERROR.
 */
export function createStandardFileSinks(options: StandardFileSinkOptions): FileSink[] {
  const writer = (name: string) =>
    new RotatingFileWriter(path.join(options.logDir, name), { maxBytes: options.maxBytes, maxFiles: options.maxFiles });
  return [
    new FileSink(writer('app.log'), { runId: options.runId }),
    new FileSink(writer('warnings.log'), { runId: options.runId, levels: ['warn'] }),
    new FileSink(writer('errors.log'), { runId: options.runId, levels: ['error'] }),
  ];
}
