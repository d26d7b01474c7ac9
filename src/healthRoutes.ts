import type { Express } from 'express';
import type { RelaySnapshot } from './relay.js';
import type { PathName } from './types.js';

const FILE_PATHS: PathName[] = ['archive', 'jsonl'];

export interface SnapshotSource {
  snapshot(): RelaySnapshot;
}

export function healthReport(snapshot: RelaySnapshot) {
  const ok = FILE_PATHS.every((name) => !snapshot.paths[name]?.stopped);
  return {
    ok,
    uptimeMs: snapshot.uptimeMs,
    received: snapshot.received,
    paths: snapshot.paths,
    uplink: snapshot.uplink
  };
}

export function registerHealthRoutes(app: Express, relay: SnapshotSource) {
  app.get('/health', (_req, res) => {
    const report = healthReport(relay.snapshot());
    res.status(report.ok ? 200 : 503).json(report);
  });

  app.get('/endpoints', (_req, res) => {
    res.json({ endpoints: relay.snapshot().endpoints });
  });
}
