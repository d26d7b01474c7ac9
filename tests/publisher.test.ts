import { describe, it, expect } from 'vitest';
import { DownstreamPublisher } from '../src/publisher.js';
import type { Endpoint } from '../src/types.js';
import { fakeSocketFactory } from './utils/fake-socket.js';
import { heartbeat, rawFrame } from './utils/frames.js';
import { captureLogger, LEVEL, silentLogger } from './utils/logger.js';

const GCS: Endpoint = { host: '127.0.0.1', port: 14551 };
const ANALYZER: Endpoint = { host: '127.0.0.1', port: 14552 };
const OFFLINE: Endpoint = { host: '10.0.0.9', port: 14560 };

describe('DownstreamPublisher', () => {
  it('sends byte-identical frames to every endpoint', async () => {
    const { factory, sockets } = fakeSocketFactory();
    const publisher = new DownstreamPublisher({ endpoints: [GCS, ANALYZER], socketFactory: factory, log: silentLogger });
    const bytes = heartbeat(12);

    await publisher.write(rawFrame(bytes));

    for (const key of ['127.0.0.1:14551', '127.0.0.1:14552']) {
      const sent = sockets.get(key)?.sent ?? [];
      expect(sent).toHaveLength(1);
      expect(sent[0].bytes.equals(bytes)).toBe(true);
    }
    expect(sockets.get('127.0.0.1:14552')?.sent[0]).toMatchObject({ address: '127.0.0.1', port: 14552 });
  });

  it('keeps sending to a reachable endpoint while another fails', async () => {
    const { factory, sockets, unreachable } = fakeSocketFactory();
    unreachable.add('10.0.0.9:14560');
    const { log, lines } = captureLogger();
    const publisher = new DownstreamPublisher({ endpoints: [GCS, OFFLINE], socketFactory: factory, log });

    for (let seq = 0; seq < 100; seq++) await publisher.write(rawFrame(heartbeat(seq)));

    expect(sockets.get('127.0.0.1:14551')?.sent).toHaveLength(100);
    expect(publisher.stats()).toEqual([
      { endpoint: 'udp:127.0.0.1:14551', sent: 100, failed: 0 },
      { endpoint: 'udp:10.0.0.9:14560', sent: 0, failed: 100 }
    ]);

    const failures = lines.filter((line) => line.msg === 'downstream send failed');
    expect(failures).toHaveLength(100);
    expect(failures.filter((line) => line.level === LEVEL.warn)).toHaveLength(1);
    expect(failures[0]).toMatchObject({ endpoint: 'udp:10.0.0.9:14560', failed: 1, component: 'publisher' });
  });

  it('logs when a failing endpoint recovers', async () => {
    const { factory, sockets } = fakeSocketFactory();
    const { log, lines } = captureLogger();
    const publisher = new DownstreamPublisher({ endpoints: [GCS], socketFactory: factory, log });
    const socket = sockets.get('127.0.0.1:14551');
    socket?.unreachable.add('127.0.0.1:14551');

    await publisher.write(rawFrame(heartbeat(1)));
    socket?.unreachable.clear();
    await publisher.write(rawFrame(heartbeat(2)));

    expect(publisher.stats()).toEqual([{ endpoint: 'udp:127.0.0.1:14551', sent: 1, failed: 1 }]);
    expect(lines.find((line) => line.msg === 'downstream endpoint recovered')).toMatchObject({ sent: 1, failed: 1 });
  });

  it('counts a send that throws as a failure instead of rejecting', async () => {
    const { factory, sockets } = fakeSocketFactory();
    const publisher = new DownstreamPublisher({ endpoints: [GCS], socketFactory: factory, log: silentLogger });
    sockets.get('127.0.0.1:14551')?.close();

    await expect(publisher.write(rawFrame(heartbeat(1)))).resolves.toBeUndefined();
    expect(publisher.stats()[0].failed).toBe(1);
  });

  it('passes datagrams sent back by a downstream peer to onReply', () => {
    const { factory, sockets } = fakeSocketFactory();
    const replies: Array<{ bytes: Buffer; endpoint: Endpoint }> = [];
    new DownstreamPublisher({
      endpoints: [GCS],
      socketFactory: factory,
      log: silentLogger,
      onReply: (bytes, endpoint) => replies.push({ bytes, endpoint })
    });

    const command = heartbeat(5, { systemId: 255, componentId: 190 });
    sockets.get('127.0.0.1:14551')?.receive(command, { address: '127.0.0.1', port: 14551 });

    expect(replies).toHaveLength(1);
    expect(replies[0].bytes.equals(command)).toBe(true);
    expect(replies[0].endpoint).toEqual(GCS);
  });

  it('releases every socket on close', async () => {
    const { factory, sockets } = fakeSocketFactory();
    const publisher = new DownstreamPublisher({ endpoints: [GCS, ANALYZER], socketFactory: factory, log: silentLogger });
    await publisher.close();

    expect([...sockets.values()].every((socket) => socket.closed)).toBe(true);
  });
});
