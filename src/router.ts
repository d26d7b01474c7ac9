import type { Logger } from './logger.js';
import { BoundedQueue } from './queue.js';
import type { Sink } from './sinks/sink.js';
import type { Direction, PathName, PathStats, RawFrame } from './types.js';

/**
 * One queue, one worker, one sink. Offers never wait; the worker writes items in
 * the order they were offered. A sink error stops this path for good.
 */
export class Path {
  private readonly queue: BoundedQueue<RawFrame>;
  private readonly log: Logger;
  private worker: Promise<void> | null = null;
  private stopped = false;
  private enqueued = 0;
  private processed = 0;
  private failed = 0;
  private abandoned = 0;

  constructor(
    private readonly sink: Sink<RawFrame>,
    capacity: number,
    log: Logger
  ) {
    this.queue = new BoundedQueue(capacity);
    this.log = log.child({ path: sink.name });
  }

  get name(): PathName {
    return this.sink.name;
  }

  start() {
    if (this.worker) return;
    this.sink.onFailure?.((error, unflushed) => this.failStop(error, unflushed));
    this.worker = this.run();
  }

  offer(frame: RawFrame) {
    if (this.stopped) {
      this.failed++;
      return;
    }

    const { accepted, evicted } = this.queue.push({ ...frame, bytes: Buffer.from(frame.bytes) });
    if (!accepted) return;
    this.enqueued++;
    if (evicted) {
      const dropped = this.queue.dropped;
      if (dropped === 1 || dropped % this.queue.capacity === 0) {
        this.log.warn({ dropped, capacity: this.queue.capacity }, 'queue full, dropping oldest frames');
      }
    }
  }

  stats(): PathStats {
    return {
      enqueued: this.enqueued,
      processed: this.processed,
      dropped: this.queue.dropped,
      failed: this.failed,
      abandoned: this.abandoned,
      pending: this.queue.size,
      stopped: this.stopped
    };
  }

  drain(): Promise<void> {
    this.queue.close();
    return this.worker ?? Promise.resolve();
  }

  abandon() {
    const discarded = this.queue.clear();
    this.abandoned += discarded;
    if (discarded > 0) this.log.warn({ abandoned: discarded }, 'shutdown grace period elapsed, discarding queued frames');
  }

  async close(): Promise<void> {
    this.abandon();
    await this.drain();
    try {
      await this.sink.close();
    } catch (error) {
      // a stopped sink rethrows the error already reported by failStop
      if (this.stopped) this.log.debug({ err: errorMessage(error) }, 'failed to close sink');
      else this.log.error({ err: errorMessage(error) }, 'failed to close sink');
    }
  }

  private async run() {
    for (;;) {
      const frame = await this.queue.shift();
      if (frame === undefined) return;
      try {
        await this.sink.write(frame);
        this.processed++;
      } catch (error) {
        this.failed++;
        this.failStop(error, 0);
        return;
      }
    }
  }

  private failStop(error: unknown, unflushed: number) {
    if (this.stopped) return;
    this.stopped = true;
    this.queue.close();
    this.failed += this.queue.clear();
    this.log.error(
      { err: errorMessage(error), processed: this.processed, dropped: this.queue.dropped, failed: this.failed, unflushed },
      'sink failed, path stopped for the rest of the run'
    );
  }
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

const ROUTES: Record<Direction, PathName[]> = {
  RX: ['downstream', 'archive', 'jsonl'],
  TX: ['uplink', 'archive', 'jsonl']
};

export interface RouterOptions {
  capacity: number;
  log: Logger;
}

export class FanOutRouter {
  private readonly paths = new Map<PathName, Path>();
  private readonly log: Logger;
  private accepting = true;

  constructor(sinks: Sink<RawFrame>[], options: RouterOptions) {
    this.log = options.log.child({ component: 'router' });
    for (const sink of sinks) {
      if (this.paths.has(sink.name)) throw new Error(`duplicate sink for path ${sink.name}`);
      this.paths.set(sink.name, new Path(sink, options.capacity, this.log));
    }
  }

  start() {
    for (const path of this.paths.values()) path.start();
  }

  dispatch(frame: RawFrame) {
    if (!this.accepting) return;
    for (const name of ROUTES[frame.direction]) this.paths.get(name)?.offer(frame);
  }

  stats(): Partial<Record<PathName, PathStats>> {
    const out: Partial<Record<PathName, PathStats>> = {};
    for (const [name, path] of this.paths) out[name] = path.stats();
    return out;
  }

  // sinks close only once their worker is idle, so no write is cut short
  async shutdown(graceMs: number): Promise<void> {
    this.accepting = false;
    const paths = [...this.paths.values()];
    const drained = Promise.all(paths.map((path) => path.drain()));

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), graceMs);
    });
    const timedOut = await Promise.race([drained.then(() => false), expired]);
    clearTimeout(timer);

    if (timedOut) this.log.warn({ graceMs }, 'paths did not drain within the grace period');
    await Promise.all(paths.map((path) => path.close()));
    this.log.info({ stats: this.stats() }, 'router stopped');
  }
}
