import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { decodeFrame } from '../../src/mavlink/decoder.js';
import { JsonlWriter, toLogRecord } from '../../src/sinks/jsonlWriter.js';
import { heartbeat, rawFrame } from '../utils/frames.js';

const HEARTBEAT_PAYLOAD = {
  custom_mode: 0,
  type: 2,
  autopilot: 12,
  base_mode: 81,
  system_status: 4,
  mavlink_version: 3
};

describe('toLogRecord', () => {
  it('projects a decoded message', () => {
    const record = toLogRecord(decodeFrame(rawFrame(heartbeat(7), 1_700_000_000_123_456n)));

    expect(record).toEqual({
      timestamp: '2023-11-14T22:13:20.123456+00:00',
      system_id: 1,
      component_id: 1,
      msg_id: 0,
      msg_name: 'HEARTBEAT',
      seq: 7,
      direction: 'RX',
      payload: HEARTBEAT_PAYLOAD
    });
  });

  it('still produces a record for a frame that fails to decode', () => {
    const record = toLogRecord(decodeFrame(rawFrame(Buffer.from([0x55, 0x01]), 1_000_000n)));

    expect(record).toEqual({
      timestamp: '1970-01-01T00:00:01.000000+00:00',
      system_id: null,
      component_id: null,
      msg_id: null,
      msg_name: 'UNKNOWN',
      seq: null,
      direction: 'RX',
      payload: {},
      decode_error: 'bad_magic'
    });
  });

  it('keeps the header of a frame with a bad checksum', () => {
    const bytes = heartbeat(9, { systemId: 3, componentId: 200 });
    bytes[bytes.length - 1] ^= 0xff;
    const record = toLogRecord(decodeFrame({ bytes, timestampUs: 0n, direction: 'TX' }));

    expect(record).toMatchObject({
      system_id: 3,
      component_id: 200,
      msg_id: 0,
      msg_name: 'UNKNOWN',
      seq: 9,
      direction: 'TX',
      payload: {},
      decode_error: 'crc_mismatch'
    });
  });
});

describe('JsonlWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relay-jsonl-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one parseable line per frame', async () => {
    const path = join(dir, 'run.jsonl');
    const writer = await JsonlWriter.open(path, { flushIntervalMs: 60_000, flushThreshold: 10 });

    await writer.write(rawFrame(heartbeat(1), 1_000_000n));
    await writer.write(rawFrame(Buffer.from('not mavlink'), 2_000_000n));
    await writer.write(rawFrame(heartbeat(2), 3_000_000n));
    await writer.close();

    const text = await readFile(path, 'utf8');
    expect(text.endsWith('\n')).toBe(true);
    const lines = text.trimEnd().split('\n').map((line) => JSON.parse(line));
    expect(lines).toHaveLength(3);
    expect(lines.map((l) => l.seq)).toEqual([1, null, 2]);
    expect(lines.map((l) => l.msg_name)).toEqual(['HEARTBEAT', 'UNKNOWN', 'HEARTBEAT']);
    expect(lines[1].payload).toEqual({});
    expect(lines[1].timestamp).toBe('1970-01-01T00:00:02.000000+00:00');
  });

  it('uses the decoder it was given', async () => {
    const path = join(dir, 'strict.jsonl');
    const writer = await JsonlWriter.open(path, {
      flushIntervalMs: 60_000,
      flushThreshold: 10,
      decode: (frame) => ({ ok: false, failure: { reason: 'unknown_message', detail: 'test', header: { msgId: 5 }, frame } })
    });
    await writer.write(rawFrame(heartbeat(1), 0n));
    await writer.close();

    const line = JSON.parse((await readFile(path, 'utf8')).trim());
    expect(line.msg_id).toBe(5);
    expect(line.decode_error).toBe('unknown_message');
  });
});
