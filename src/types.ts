export type Direction = 'RX' | 'TX';

export interface RawFrame {
  bytes: Buffer;
  // microseconds since the Unix epoch
  timestampUs: bigint;
  direction: Direction;
}

export type FieldValue = number | string | number[];

export interface DecodedMessage {
  msgId: number;
  msgName: string;
  systemId: number;
  componentId: number;
  seq: number;
  fields: Record<string, FieldValue>;
  readonly frame: RawFrame;
}

export type DecodeFailureReason = 'truncated' | 'bad_magic' | 'crc_mismatch' | 'unknown_message';

export interface DecodeFailure {
  reason: DecodeFailureReason;
  detail: string;
  header: Partial<Pick<DecodedMessage, 'msgId' | 'systemId' | 'componentId' | 'seq'>>;
  readonly frame: RawFrame;
}

export type DecodeResult = { ok: true; message: DecodedMessage } | { ok: false; failure: DecodeFailure };

export interface LogRecord {
  timestamp: string;
  system_id: number | null;
  component_id: number | null;
  msg_id: number | null;
  msg_name: string;
  seq: number | null;
  direction: Direction;
  payload: Record<string, FieldValue>;
  decode_error?: DecodeFailureReason;
}

export interface Endpoint {
  host: string;
  port: number;
}

export type PathName = 'downstream' | 'archive' | 'jsonl' | 'uplink';

export interface PathStats {
  enqueued: number;
  processed: number;
  dropped: number;
  failed: number;
  abandoned: number;
  pending: number;
  stopped: boolean;
}

export interface EndpointStats {
  endpoint: string;
  sent: number;
  failed: number;
}
