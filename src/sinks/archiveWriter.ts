import { BufferedFileWriter, type FailureListener, type FileWriterOptions } from './fileWriter.js';
import type { Sink } from './sink.js';
import type { RawFrame } from '../types.js';

export const TIMESTAMP_HEADER_LENGTH = 8;

// .tlog record: [u64 BE microseconds since epoch][raw frame]
export function encodeArchiveRecord(frame: RawFrame) {
  const record = Buffer.allocUnsafe(TIMESTAMP_HEADER_LENGTH + frame.bytes.length);
  record.writeBigUInt64BE(frame.timestampUs, 0);
  frame.bytes.copy(record, TIMESTAMP_HEADER_LENGTH);
  return record;
}

export class ArchiveWriter implements Sink<RawFrame> {
  readonly name = 'archive';

  private constructor(private readonly file: BufferedFileWriter) {}

  static async open(path: string, options: FileWriterOptions) {
    return new ArchiveWriter(await BufferedFileWriter.open(path, options));
  }

  get path() {
    return this.file.path;
  }

  write(frame: RawFrame) {
    return this.file.append(encodeArchiveRecord(frame));
  }

  onFailure(listener: FailureListener) {
    this.file.onFailure(listener);
  }

  close() {
    return this.file.close();
  }
}
