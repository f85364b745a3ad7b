import fs from 'node:fs';
import path from 'node:path';

export interface LogSink {
  write(line: string): void;
}

export interface RotatingLogFileOptions {
  maxBytes?: number;
  backups?: number;
}

const DEFAULT_MAX_BYTES = 2 * 1024 * 1024;
const DEFAULT_BACKUPS = 3;

/**
 * Appends log lines to a file and rolls it over to `<file>.1` … `<file>.N`
 * once it grows past `maxBytes`.
 */
export class RotatingLogFile implements LogSink {
  private readonly maxBytes: number;
  private readonly backups: number;
  private size: number;
  private broken = false;

  constructor(
    private readonly filePath: string,
    options: RotatingLogFileOptions = {},
  ) {
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    this.backups = options.backups ?? DEFAULT_BACKUPS;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.size = fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
  }

  public get path(): string {
    return this.filePath;
  }

  public write(line: string): void {
    if (this.broken) {
      return;
    }
    const chunk = `${line}\n`;
    const bytes = Buffer.byteLength(chunk);
    try {
      if (this.size > 0 && this.size + bytes > this.maxBytes) {
        this.rotate();
      }
      fs.appendFileSync(this.filePath, chunk, 'utf-8');
      this.size += bytes;
    } catch (error) {
      // Reported once; the file sink stays off afterwards.
      this.broken = true;
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`log file disabled (${this.filePath}): ${message}\n`);
    }
  }

  private rotate(): void {
    for (let index = this.backups; index >= 1; index -= 1) {
      const source = index === 1 ? this.filePath : `${this.filePath}.${index - 1}`;
      const target = `${this.filePath}.${index}`;
      if (fs.existsSync(source)) {
        fs.renameSync(source, target);
      }
    }
    if (this.backups < 1) {
      fs.rmSync(this.filePath, { force: true });
    }
    this.size = 0;
  }
}
