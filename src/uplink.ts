import type { IngressListener } from './ingress.js';
import type { Logger } from './logger.js';
import type { Sink } from './sinks/sink.js';
import type { RawFrame } from './types.js';

// replies leave from the listen socket, the port the vehicle streams to
export class UplinkSender implements Sink<RawFrame> {
  readonly name = 'uplink';
  private readonly log: Logger;
  private _sent = 0;
  private _skipped = 0;
  private _failed = 0;

  constructor(private readonly ingress: Pick<IngressListener, 'peer' | 'send'>, log: Logger) {
    this.log = log.child({ component: 'uplink' });
  }

  stats() {
    return { sent: this._sent, skipped: this._skipped, failed: this._failed };
  }

  async write(frame: RawFrame): Promise<void> {
    const peer = this.ingress.peer;
    if (!peer) {
      this._skipped++;
      if (this._skipped === 1) this.log.warn('no upstream peer seen yet; dropping ground-station frame');
      return;
    }

    try {
      await this.ingress.send(frame.bytes, peer);
      this._sent++;
    } catch (error) {
      this._failed++;
      this.log.warn(
        { peer: `${peer.address}:${peer.port}`, failed: this._failed, err: error instanceof Error ? error.message : String(error) },
        'uplink send failed'
      );
    }
  }

  async close(): Promise<void> {
    // the listen socket belongs to the ingress listener
  }
}
