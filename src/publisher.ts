import type { Logger } from './logger.js';
import { formatEndpoint } from './config.js';
import { closeSocket, type DatagramSocket, type SocketFactory } from './transport.js';
import type { Sink } from './sinks/sink.js';
import type { Endpoint, EndpointStats, RawFrame } from './types.js';

interface Target {
  endpoint: Endpoint;
  label: string;
  socket: DatagramSocket;
  sent: number;
  failed: number;
  failing: boolean;
}

export interface PublisherOptions {
  endpoints: Endpoint[];
  socketFactory: SocketFactory;
  log: Logger;
  onReply?: (bytes: Buffer, endpoint: Endpoint) => void;
}

export class DownstreamPublisher implements Sink<RawFrame> {
  readonly name = 'downstream';
  private readonly targets: Target[];
  private readonly log: Logger;

  constructor(options: PublisherOptions) {
    this.log = options.log.child({ component: 'publisher' });
    this.targets = options.endpoints.map((endpoint) => {
      const target: Target = {
        endpoint,
        label: formatEndpoint(endpoint),
        socket: options.socketFactory(endpoint),
        sent: 0,
        failed: 0,
        failing: false
      };
      target.socket.on('error', (err) => {
        this.log.warn({ endpoint: target.label, err: err.message }, 'downstream socket error');
      });
      const { onReply } = options;
      if (onReply) target.socket.on('message', (msg) => onReply(msg, endpoint));
      return target;
    });
  }

  async write(frame: RawFrame): Promise<void> {
    await Promise.all(this.targets.map((target) => this.sendTo(target, frame.bytes)));
  }

  stats(): EndpointStats[] {
    return this.targets.map(({ label, sent, failed }) => ({ endpoint: label, sent, failed }));
  }

  async close(): Promise<void> {
    await Promise.all(this.targets.map((target) => closeSocket(target.socket)));
  }

  private sendTo(target: Target, bytes: Buffer) {
    return new Promise<void>((resolve) => {
      const done = (error: Error | null) => {
        if (error) this.recordFailure(target, error);
        else this.recordSuccess(target);
        resolve();
      };
      try {
        target.socket.send(bytes, target.endpoint.port, target.endpoint.host, done);
      } catch (error) {
        done(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  private recordSuccess(target: Target) {
    target.sent++;
    if (target.failing) {
      target.failing = false;
      this.log.info({ endpoint: target.label, sent: target.sent, failed: target.failed }, 'downstream endpoint recovered');
    }
  }

  private recordFailure(target: Target, error: Error) {
    target.failed++;
    const context = { endpoint: target.label, sent: target.sent, failed: target.failed, err: error.message };
    if (!target.failing) {
      target.failing = true;
      this.log.warn(context, 'downstream send failed');
    } else {
      this.log.debug(context, 'downstream send failed');
    }
  }
}
