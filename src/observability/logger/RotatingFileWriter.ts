import fs from 'node:fs';
import path from 'node:path';

export type WriterOp = 'mkdir' | 'stat' | 'append' | 'rotate';

export interface RotatingFileWriterOptions {
  maxBytes: number;
  /** Rotated generations kept as `<file>.1` .. `<file>.N`; 0 truncates in place. */
  maxFiles: number;
  onError?: (op: WriterOp, err: unknown) => void;
}

// Ошибки записи логов не должны ронять процесс и не могут идти через logger
// (FileSink сам пишет через этот writer), поэтому по умолчанию одна строка в stderr на операцию.
function stderrOnce(filePath: string): (op: WriterOp, err: unknown) => void {
  const reported = new Set<WriterOp>();
  return (op, err) => {
    if (reported.has(op)) return;
    reported.add(op);
    const reason = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[RotatingFileWriter] ${op} failed for ${filePath}: ${reason}\n`);
  };
}

export class RotatingFileWriter {
  readonly filePath: string;
  private readonly maxBytes: number;
  private readonly maxFiles: number;
  private readonly onError: (op: WriterOp, err: unknown) => void;
  private currentSize = 0;
  private failures = 0;
  private closed = false;

  constructor(filePath: string, options: RotatingFileWriterOptions) {
    this.filePath = filePath;
    this.maxBytes = Math.max(0, Math.floor(options.maxBytes));
    this.maxFiles = Math.max(0, Math.floor(options.maxFiles));
    this.onError = options.onError ?? stderrOnce(filePath);

    this.ensureDir();
    this.currentSize = this.statSize();
  }

  write(line: string): void {
    if (this.closed) return;
    const payload = line.endsWith('\n') ? line : `${line}\n`;
    const bytes = Buffer.byteLength(payload);
    if (this.maxBytes > 0 && this.currentSize + bytes > this.maxBytes) {
      this.rotate();
    }
    try {
      fs.appendFileSync(this.filePath, payload);
      this.currentSize += bytes;
    } catch (err) {
      this.fail('append', err);
    }
  }

  getFailureCount(): number {
    return this.failures;
  }

  close(): void {
    this.closed = true;
  }

  private fail(op: WriterOp, err: unknown): void {
    this.failures += 1;
    this.onError(op, err);
  }

  private ensureDir(): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    } catch (err) {
      this.fail('mkdir', err);
    }
  }

  private statSize(): number {
    if (!fs.existsSync(this.filePath)) return 0;
    try {
      return fs.statSync(this.filePath).size;
    } catch (err) {
      this.fail('stat', err);
      return 0;
    }
  }

  private rotate(): void {
    try {
      if (this.maxFiles === 0) {
        fs.writeFileSync(this.filePath, '');
      } else {
        const oldest = `${this.filePath}.${this.maxFiles}`;
        if (fs.existsSync(oldest)) fs.unlinkSync(oldest);
        for (let i = this.maxFiles - 1; i >= 1; i -= 1) {
          const src = `${this.filePath}.${i}`;
          if (fs.existsSync(src)) fs.renameSync(src, `${this.filePath}.${i + 1}`);
        }
        if (fs.existsSync(this.filePath)) fs.renameSync(this.filePath, `${this.filePath}.1`);
      }
    } catch (err) {
      this.fail('rotate', err);
    }
    this.currentSize = 0;
  }
}
