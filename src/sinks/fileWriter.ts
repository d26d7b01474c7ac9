import { open } from 'node:fs/promises';
import { SinkClosedError } from '../errors.js';

export interface WritableFile {
  write(buffer: Buffer, offset: number, length: number): Promise<{ bytesWritten: number }>;
  close(): Promise<void>;
}

export interface FileWriterOptions {
  flushIntervalMs: number;
  flushThreshold: number;
  openFile?: (path: string) => Promise<WritableFile>;
}

export type FailureListener = (error: Error, unflushed: number) => void;

const openForAppend = (path: string): Promise<WritableFile> => open(path, 'a');

/**
 * Append-only file that batches whole records in memory and writes them on a
 * record-count threshold or a timer. Once a write fails every later call
 * rejects with that error.
 */
export class BufferedFileWriter {
  private pending: Buffer[] = [];
  private flushing: Promise<void> = Promise.resolve();
  private failure: Error | null = null;
  private readonly listeners: FailureListener[] = [];
  private closed = false;
  private readonly timer: NodeJS.Timeout;

  private constructor(
    readonly path: string,
    private readonly handle: WritableFile,
    private readonly options: FileWriterOptions
  ) {
    // failures from here reach onFailure listeners
    this.timer = setInterval(() => void this.schedule(), options.flushIntervalMs);
    this.timer.unref();
  }

  static async open(path: string, options: FileWriterOptions) {
    const handle = await (options.openFile ?? openForAppend)(path);
    return new BufferedFileWriter(path, handle, options);
  }

  get bufferedRecords() {
    return this.pending.length;
  }

  onFailure(listener: FailureListener) {
    this.listeners.push(listener);
  }

  async append(record: Buffer): Promise<void> {
    if (this.failure) throw this.failure;
    if (this.closed) throw new SinkClosedError(this.path);
    this.pending.push(record);
    if (this.pending.length >= this.options.flushThreshold) await this.flush();
  }

  async flush(): Promise<void> {
    await this.schedule();
    if (this.failure) throw this.failure;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    clearInterval(this.timer);
    try {
      await this.flush();
    } finally {
      await this.handle.close();
    }
  }

  private schedule(): Promise<void> {
    this.flushing = this.flushing.then(() => this.writePending());
    return this.flushing;
  }

  private async writePending() {
    if (this.failure || this.pending.length === 0) return;
    const batch = this.pending;
    this.pending = [];
    const data = Buffer.concat(batch);
    let offset = 0;
    try {
      while (offset < data.length) {
        const { bytesWritten } = await this.handle.write(data, offset, data.length - offset);
        offset += bytesWritten;
      }
    } catch (error) {
      this.fail(error, batch.length);
    }
  }

  private fail(error: unknown, unflushed: number) {
    this.failure = error instanceof Error ? error : new Error(String(error));
    for (const listener of this.listeners) listener(this.failure, unflushed);
  }
}
