import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { Endpoint } from './types.js';

const ENDPOINT_PATTERN = /^(?:udp:)?([^:\s]+):(\d{1,5})$/;

export function parseEndpoint(value: string): Endpoint {
  const match = ENDPOINT_PATTERN.exec(value.trim());
  if (!match) throw new Error(`expected [udp:]host:port, got "${value}"`);
  const port = Number(match[2]);
  if (port < 1 || port > 65535) throw new Error(`port out of range in "${value}"`);
  return { host: match[1], port };
}

export function formatEndpoint(endpoint: Endpoint) {
  return `udp:${endpoint.host}:${endpoint.port}`;
}

const EndpointSchema = z.string().transform((value, ctx) => {
  try {
    return parseEndpoint(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
    return z.NEVER;
  }
});

const EndpointListSchema = z
  .string()
  .transform((value) => value.split(',').map((s) => s.trim()).filter(Boolean))
  .pipe(z.array(EndpointSchema).min(1, 'at least one forward endpoint is required'));

const BooleanSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const ConfigSchema = z.object({
  RELAY_LISTEN: EndpointSchema.default('udp:127.0.0.1:14550'),
  RELAY_FORWARD: EndpointListSchema.default('udp:127.0.0.1:14551'),
  RELAY_LOG_DIR: z.string().min(1).default('logs'),
  RELAY_QUEUE_CAPACITY: z.coerce.number().int().positive().default(1000),
  RELAY_FLUSH_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  RELAY_FLUSH_THRESHOLD: z.coerce.number().int().positive().default(100),
  RELAY_SHUTDOWN_GRACE_MS: z.coerce.number().int().nonnegative().default(5000),
  RELAY_DECODE_STRICT: BooleanSchema.default('false'),
  RELAY_UPLINK: BooleanSchema.default('true'),
  RELAY_INGRESS_MAX_FAILURES: z.coerce.number().int().positive().default(3),
  RELAY_INGRESS_FAILURE_WINDOW_MS: z.coerce.number().int().positive().default(5000),
  HEALTH_PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: BooleanSchema.default('true')
});

export interface RelayConfig {
  listen: Endpoint;
  forward: Endpoint[];
  logDir: string;
  queueCapacity: number;
  flushIntervalMs: number;
  flushThreshold: number;
  shutdownGraceMs: number;
  decodeStrict: boolean;
  uplink: boolean;
  ingressMaxFailures: number;
  ingressFailureWindowMs: number;
  healthPort: number;
  logLevel: z.infer<typeof ConfigSchema>['LOG_LEVEL'];
  logPretty: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<RelayConfig> {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  return Object.freeze({
    listen: e.RELAY_LISTEN,
    forward: e.RELAY_FORWARD,
    logDir: e.RELAY_LOG_DIR,
    queueCapacity: e.RELAY_QUEUE_CAPACITY,
    flushIntervalMs: e.RELAY_FLUSH_INTERVAL_MS,
    flushThreshold: e.RELAY_FLUSH_THRESHOLD,
    shutdownGraceMs: e.RELAY_SHUTDOWN_GRACE_MS,
    decodeStrict: e.RELAY_DECODE_STRICT,
    uplink: e.RELAY_UPLINK,
    ingressMaxFailures: e.RELAY_INGRESS_MAX_FAILURES,
    ingressFailureWindowMs: e.RELAY_INGRESS_FAILURE_WINDOW_MS,
    healthPort: e.HEALTH_PORT,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY
  });
}
