import { describe, it, expect } from 'vitest';
import type { UpstreamPeer } from '../src/ingress.js';
import { UplinkSender } from '../src/uplink.js';
import { heartbeat } from './utils/frames.js';
import { silentLogger } from './utils/logger.js';

function txFrame(seq: number) {
  return { bytes: heartbeat(seq, { systemId: 255, componentId: 190 }), timestampUs: 0n, direction: 'TX' as const };
}

describe('UplinkSender', () => {
  it('skips frames until an upstream peer is known', async () => {
    const sent: Array<{ bytes: Buffer; peer: UpstreamPeer }> = [];
    let peer: UpstreamPeer | null = null;
    const ingress = {
      get peer() {
        return peer;
      },
      send: async (bytes: Buffer, peer: UpstreamPeer) => {
        sent.push({ bytes, peer });
      }
    };
    const uplink = new UplinkSender(ingress, silentLogger);

    await uplink.write(txFrame(1));
    peer = { address: '10.1.1.2', port: 14555 };
    const frame = txFrame(2);
    await uplink.write(frame);

    expect(sent).toEqual([{ bytes: frame.bytes, peer: { address: '10.1.1.2', port: 14555 } }]);
    expect(uplink.stats()).toEqual({ sent: 1, skipped: 1, failed: 0 });
  });

  it('counts send errors without failing the path', async () => {
    const ingress = {
      peer: { address: '10.1.1.2', port: 14555 },
      send: async () => {
        throw new Error('ENETUNREACH');
      }
    };
    const uplink = new UplinkSender(ingress, silentLogger);

    await expect(uplink.write(txFrame(1))).resolves.toBeUndefined();
    expect(uplink.stats()).toEqual({ sent: 0, skipped: 0, failed: 1 });
  });
});
