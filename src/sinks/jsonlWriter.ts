import { formatIsoMicros } from '../clock.js';
import { decodeFrame, type FrameDecoder } from '../mavlink/decoder.js';
import { BufferedFileWriter, type FailureListener, type FileWriterOptions } from './fileWriter.js';
import type { Sink } from './sink.js';
import type { DecodeResult, LogRecord, RawFrame } from '../types.js';

export const UNKNOWN_MESSAGE_NAME = 'UNKNOWN';

export function toLogRecord(result: DecodeResult): LogRecord {
  if (result.ok) {
    const { message } = result;
    return {
      timestamp: formatIsoMicros(message.frame.timestampUs),
      system_id: message.systemId,
      component_id: message.componentId,
      msg_id: message.msgId,
      msg_name: message.msgName,
      seq: message.seq,
      direction: message.frame.direction,
      payload: message.fields
    };
  }

  const { failure } = result;
  return {
    timestamp: formatIsoMicros(failure.frame.timestampUs),
    system_id: failure.header.systemId ?? null,
    component_id: failure.header.componentId ?? null,
    msg_id: failure.header.msgId ?? null,
    msg_name: UNKNOWN_MESSAGE_NAME,
    seq: failure.header.seq ?? null,
    direction: failure.frame.direction,
    payload: {},
    decode_error: failure.reason
  };
}

export class JsonlWriter implements Sink<RawFrame> {
  readonly name = 'jsonl';

  private constructor(
    private readonly file: BufferedFileWriter,
    private readonly decode: FrameDecoder
  ) {}

  static async open(path: string, options: FileWriterOptions & { decode?: FrameDecoder }) {
    return new JsonlWriter(await BufferedFileWriter.open(path, options), options.decode ?? decodeFrame);
  }

  get path() {
    return this.file.path;
  }

  write(frame: RawFrame) {
    const line = JSON.stringify(toLogRecord(this.decode(frame))) + '\n';
    return this.file.append(Buffer.from(line, 'utf8'));
  }

  onFailure(listener: FailureListener) {
    this.file.onFailure(listener);
  }

  close() {
    return this.file.close();
  }
}
