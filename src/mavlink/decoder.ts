import { defaultCatalogue, elementSize, type Catalogue, type FieldDefinition } from './catalogue.js';
import { frameChecksum } from './crc.js';
import type { DecodeFailure, DecodeResult, FieldValue, RawFrame } from '../types.js';

export const MAGIC_V1 = 0xfe;
export const MAGIC_V2 = 0xfd;
export const HEADER_LENGTH_V1 = 6;
export const HEADER_LENGTH_V2 = 10;
export const CHECKSUM_LENGTH = 2;
export const SIGNATURE_LENGTH = 13;
export const INCOMPAT_FLAG_SIGNED = 0x01;

export interface DecoderOptions {
  strict?: boolean;
  catalogue?: Catalogue;
}

export type FrameDecoder = (frame: RawFrame) => DecodeResult;

interface FrameHeader {
  headerLength: number;
  payloadLength: number;
  frameLength: number;
  seq: number;
  systemId: number;
  componentId: number;
  msgId: number;
}

function readHeader(bytes: Buffer): FrameHeader | null {
  if (bytes[0] === MAGIC_V1) {
    if (bytes.length < HEADER_LENGTH_V1) return null;
    const payloadLength = bytes[1];
    return {
      headerLength: HEADER_LENGTH_V1,
      payloadLength,
      frameLength: HEADER_LENGTH_V1 + payloadLength + CHECKSUM_LENGTH,
      seq: bytes[2],
      systemId: bytes[3],
      componentId: bytes[4],
      msgId: bytes[5]
    };
  }

  if (bytes.length < HEADER_LENGTH_V2) return null;
  const payloadLength = bytes[1];
  const signed = (bytes[2] & INCOMPAT_FLAG_SIGNED) !== 0;
  return {
    headerLength: HEADER_LENGTH_V2,
    payloadLength,
    frameLength: HEADER_LENGTH_V2 + payloadLength + CHECKSUM_LENGTH + (signed ? SIGNATURE_LENGTH : 0),
    seq: bytes[4],
    systemId: bytes[5],
    componentId: bytes[6],
    msgId: bytes.readUIntLE(7, 3)
  };
}

function toSafeNumber(value: bigint): number | string {
  return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
    ? Number(value)
    : value.toString();
}

function readElement(payload: Buffer, field: FieldDefinition, offset: number): number | string {
  switch (field.type) {
    case 'uint8_t':
    case 'char':
      return payload.readUInt8(offset);
    case 'int8_t':
      return payload.readInt8(offset);
    case 'uint16_t':
      return payload.readUInt16LE(offset);
    case 'int16_t':
      return payload.readInt16LE(offset);
    case 'uint32_t':
      return payload.readUInt32LE(offset);
    case 'int32_t':
      return payload.readInt32LE(offset);
    case 'float':
      return payload.readFloatLE(offset);
    case 'double':
      return payload.readDoubleLE(offset);
    case 'uint64_t':
      return toSafeNumber(payload.readBigUInt64LE(offset));
    case 'int64_t':
      return toSafeNumber(payload.readBigInt64LE(offset));
  }
}

function readField(payload: Buffer, field: FieldDefinition, offset: number): FieldValue {
  if (field.arrayLength === undefined) return readElement(payload, field, offset);

  if (field.type === 'char') {
    const raw = payload.subarray(offset, offset + field.arrayLength);
    const end = raw.indexOf(0);
    return raw.subarray(0, end === -1 ? raw.length : end).toString('utf8');
  }

  const size = elementSize(field.type);
  const values: number[] = [];
  for (let i = 0; i < field.arrayLength; i++) {
    const value = readElement(payload, field, offset + i * size);
    values.push(typeof value === 'string' ? Number(value) : value);
  }
  return values;
}

export function decodeFrame(frame: RawFrame, options: DecoderOptions = {}): DecodeResult {
  const catalogue = options.catalogue ?? defaultCatalogue;
  const bytes = frame.bytes;
  const fail = (reason: DecodeFailure['reason'], detail: string, header: DecodeFailure['header'] = {}): DecodeResult => ({
    ok: false,
    failure: { reason, detail, header, frame }
  });

  if (bytes.length === 0) return fail('truncated', 'empty datagram');
  if (bytes[0] !== MAGIC_V1 && bytes[0] !== MAGIC_V2) {
    return fail('bad_magic', `unexpected start byte 0x${bytes[0].toString(16).padStart(2, '0')}`);
  }

  const header = readHeader(bytes);
  if (!header) return fail('truncated', `${bytes.length} bytes is shorter than a frame header`);

  const known = {
    msgId: header.msgId,
    systemId: header.systemId,
    componentId: header.componentId,
    seq: header.seq
  };

  if (bytes.length < header.frameLength) {
    return fail('truncated', `declared ${header.frameLength} bytes, received ${bytes.length}`, known);
  }

  const definition = catalogue.get(header.msgId);
  if (!definition) {
    if (options.strict) return fail('unknown_message', `message id ${header.msgId} is not in the catalogue`, known);
    return { ok: true, message: { ...known, msgName: `UNKNOWN_${header.msgId}`, fields: {}, frame } };
  }

  const payloadEnd = header.headerLength + header.payloadLength;
  const expected = frameChecksum(bytes.subarray(1, payloadEnd), definition.crcExtra);
  const received = bytes.readUInt16LE(payloadEnd);
  if (expected !== received) {
    return fail(
      'crc_mismatch',
      `checksum 0x${received.toString(16)} does not match 0x${expected.toString(16)} for ${definition.name}`,
      known
    );
  }

  // v2 senders strip trailing zero bytes from the payload
  let payload = bytes.subarray(header.headerLength, payloadEnd);
  if (payload.length < definition.payloadLength) {
    const padded = Buffer.alloc(definition.payloadLength);
    payload.copy(padded);
    payload = padded;
  }

  const fields: Record<string, FieldValue> = {};
  let offset = 0;
  for (const field of definition.fields) {
    fields[field.name] = readField(payload, field, offset);
    offset += field.size;
  }

  return { ok: true, message: { ...known, msgName: definition.name, fields, frame } };
}

export function createDecoder(options: DecoderOptions = {}): FrameDecoder {
  return (frame) => decodeFrame(frame, options);
}
