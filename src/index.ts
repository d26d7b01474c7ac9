#!/usr/bin/env node
import 'dotenv/config';
import express from 'express';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';
import { registerHealthRoutes } from './healthRoutes.js';
import { createLogger } from './logger.js';
import { Relay } from './relay.js';
import { createShutdown } from './shutdown.js';

function readConfig() {
  try {
    return loadConfig();
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.error('Invalid configuration:');
    for (const issue of error.issues) console.error(`  - ${issue}`);
    return null;
  }
}

async function main() {
  const config = readConfig();
  if (!config) {
    process.exitCode = 2;
    return;
  }

  const log = createLogger(config);

  const { register, shutdown } = createShutdown(log, (code) => {
    process.exitCode = code;
  });

  const relay = await Relay.start(config, {
    log,
    onFatal: () => {
      void shutdown('upstream unreachable', 1);
    }
  });
  register({ close: () => relay.stop() });

  if (config.healthPort > 0) {
    const app = express();
    registerHealthRoutes(app, relay);
    const server = app.listen(config.healthPort, () => log.info({ port: config.healthPort }, 'health endpoint listening'));
    register({ close: () => void server.close() });
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
