import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { createMonotonicClock, formatFileStamp, type Clock } from './clock.js';
import { formatEndpoint, type RelayConfig } from './config.js';
import type { UpstreamUnreachableError } from './errors.js';
import { IngressListener } from './ingress.js';
import type { Logger } from './logger.js';
import { createDecoder } from './mavlink/decoder.js';
import { DownstreamPublisher } from './publisher.js';
import { FanOutRouter } from './router.js';
import { ArchiveWriter } from './sinks/archiveWriter.js';
import { JsonlWriter } from './sinks/jsonlWriter.js';
import type { Sink } from './sinks/sink.js';
import { udpSocketFactory, type SocketFactory } from './transport.js';
import type { EndpointStats, PathName, PathStats, RawFrame } from './types.js';
import { UplinkSender } from './uplink.js';

export interface RelayDeps {
  log: Logger;
  socketFactory?: SocketFactory;
  clock?: Clock;
  startedAt?: Date;
  onFatal?: (error: UpstreamUnreachableError) => void;
}

export function logFilePaths(logDir: string, startedAt: Date) {
  const stamp = formatFileStamp(startedAt);
  return {
    archive: join(logDir, `telemetry_${stamp}.tlog`),
    jsonl: join(logDir, `telemetry_${stamp}.jsonl`)
  };
}

export interface RelaySnapshot {
  uptimeMs: number;
  received: number;
  paths: Partial<Record<PathName, PathStats>>;
  endpoints: EndpointStats[];
  uplink: { sent: number; skipped: number; failed: number } | null;
}

export class Relay {
  private stopping: Promise<void> | null = null;

  private constructor(
    private readonly config: Readonly<RelayConfig>,
    private readonly log: Logger,
    private readonly ingress: IngressListener,
    private readonly router: FanOutRouter,
    private readonly publisher: DownstreamPublisher,
    private readonly uplink: UplinkSender | null,
    readonly files: { archive: string; jsonl: string },
    private readonly startedAt: number
  ) {}

  static async start(config: Readonly<RelayConfig>, deps: RelayDeps): Promise<Relay> {
    const log = deps.log;
    const clock = deps.clock ?? createMonotonicClock();
    const socketFactory = deps.socketFactory ?? udpSocketFactory;
    const startedAt = deps.startedAt ?? new Date();

    await mkdir(config.logDir, { recursive: true });
    const files = logFilePaths(config.logDir, startedAt);
    const fileOptions = { flushIntervalMs: config.flushIntervalMs, flushThreshold: config.flushThreshold };

    const archive = await ArchiveWriter.open(files.archive, fileOptions);
    const jsonl = await JsonlWriter.open(files.jsonl, {
      ...fileOptions,
      decode: createDecoder({ strict: config.decodeStrict })
    });

    // the router is created after the sinks, but replies can only arrive once sockets are in use
    let router: FanOutRouter | null = null;
    const publisher = new DownstreamPublisher({
      endpoints: config.forward,
      socketFactory,
      log,
      onReply: config.uplink
        ? (bytes) => router?.dispatch({ bytes, timestampUs: clock(), direction: 'TX' })
        : undefined
    });

    const ingress = new IngressListener({
      endpoint: config.listen,
      socket: socketFactory(config.listen),
      clock,
      log,
      maxFailures: config.ingressMaxFailures,
      failureWindowMs: config.ingressFailureWindowMs,
      onFrame: (frame) => router?.dispatch(frame),
      onFatal: (error) => {
        log.fatal({ err: error.message }, 'upstream unreachable');
        deps.onFatal?.(error);
      }
    });

    const uplink = config.uplink ? new UplinkSender(ingress, log) : null;
    const sinks: Sink<RawFrame>[] = [publisher, archive, jsonl];
    if (uplink) sinks.push(uplink);

    router = new FanOutRouter(sinks, { capacity: config.queueCapacity, log });
    router.start();
    try {
      await ingress.start();
    } catch (error) {
      await router.shutdown(0);
      await ingress.close();
      throw error;
    }

    log.info(
      {
        listen: formatEndpoint(config.listen),
        forward: config.forward.map(formatEndpoint),
        archive: files.archive,
        jsonl: files.jsonl,
        queueCapacity: config.queueCapacity
      },
      'relay running'
    );

    return new Relay(config, log, ingress, router, publisher, uplink, files, Date.now());
  }

  snapshot(): RelaySnapshot {
    return {
      uptimeMs: Date.now() - this.startedAt,
      received: this.ingress.received,
      paths: this.router.stats(),
      endpoints: this.publisher.stats(),
      uplink: this.uplink?.stats() ?? null
    };
  }

  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  private async shutdown() {
    this.log.info('stopping relay');
    this.ingress.stop();
    await this.router.shutdown(this.config.shutdownGraceMs);
    await this.ingress.close();
    this.log.info({ received: this.ingress.received }, 'relay stopped');
  }
}
