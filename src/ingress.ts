import type { Clock } from './clock.js';
import { formatEndpoint } from './config.js';
import { UpstreamUnreachableError } from './errors.js';
import type { Logger } from './logger.js';
import { bindSocket, closeSocket, type DatagramSocket, type RemoteInfo } from './transport.js';
import type { Endpoint, RawFrame } from './types.js';

export interface IngressOptions {
  endpoint: Endpoint;
  socket: DatagramSocket;
  clock: Clock;
  log: Logger;
  maxFailures: number;
  failureWindowMs: number;
  onFrame: (frame: RawFrame) => void;
  onFatal: (error: UpstreamUnreachableError) => void;
  now?: () => number;
}

export interface UpstreamPeer {
  address: string;
  port: number;
}

export class IngressListener {
  private readonly log: Logger;
  private readonly now: () => number;
  private failures: number[] = [];
  private accepting = false;
  private fatalRaised = false;
  private _peer: UpstreamPeer | null = null;
  private _received = 0;

  constructor(private readonly options: IngressOptions) {
    this.log = options.log.child({ component: 'ingress', endpoint: formatEndpoint(options.endpoint) });
    this.now = options.now ?? Date.now;
  }

  get peer() {
    return this._peer;
  }

  get received() {
    return this._received;
  }

  async start(): Promise<void> {
    const { socket, endpoint } = this.options;
    socket.on('message', (msg, rinfo) => this.handleMessage(msg, rinfo));
    socket.on('error', (err) => this.handleError(err));
    await bindSocket(socket, endpoint);
    this.accepting = true;
    this.log.info('listening for upstream telemetry');
  }

  // the socket stays open for uplink sends until close()
  stop() {
    this.accepting = false;
  }

  async close() {
    this.accepting = false;
    await closeSocket(this.options.socket);
  }

  send(bytes: Buffer, peer: UpstreamPeer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.options.socket.send(bytes, peer.port, peer.address, (error) => (error ? reject(error) : resolve()));
    });
  }

  private handleMessage(msg: Buffer, rinfo: RemoteInfo) {
    if (!this.accepting) return;
    this.failures = [];
    this._received++;
    if (!this._peer || this._peer.address !== rinfo.address || this._peer.port !== rinfo.port) {
      this._peer = { address: rinfo.address, port: rinfo.port };
      this.log.info({ peer: `${rinfo.address}:${rinfo.port}` }, 'upstream peer seen');
    }
    this.options.onFrame({ bytes: msg, timestampUs: this.options.clock(), direction: 'RX' });
  }

  private handleError(err: Error) {
    const { maxFailures, failureWindowMs } = this.options;
    const now = this.now();
    this.failures = this.failures.filter((at) => now - at <= failureWindowMs);
    this.failures.push(now);
    this.log.warn({ err: err.message, consecutiveFailures: this.failures.length }, 'upstream receive error');

    if (this.failures.length >= maxFailures && !this.fatalRaised) {
      this.fatalRaised = true;
      this.accepting = false;
      this.options.onFatal(new UpstreamUnreachableError(this.failures.length, failureWindowMs, err));
    }
  }
}
