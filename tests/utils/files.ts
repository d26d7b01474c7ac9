import type { WritableFile } from '../../src/sinks/fileWriter.js';

/** A file whose every write fails, as on a full disk. */
export class FailingFile implements WritableFile {
  writes = 0;
  closed = false;

  constructor(private readonly error = new Error('ENOSPC: no space left on device, write')) {}

  async write(): Promise<{ bytesWritten: number }> {
    this.writes++;
    throw this.error;
  }

  async close() {
    this.closed = true;
  }
}
