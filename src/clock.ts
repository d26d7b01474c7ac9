export type Clock = () => bigint;

// anchored to Date.now() once, then advanced by hrtime so it never goes backwards
export function createMonotonicClock(): Clock {
  const anchorUs = BigInt(Date.now()) * 1000n;
  const anchorNs = process.hrtime.bigint();
  return () => anchorUs + (process.hrtime.bigint() - anchorNs) / 1000n;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

// 2024-05-01T12:00:00.123456+00:00
export function formatIsoMicros(timestampUs: bigint) {
  const ms = Number(timestampUs / 1000n);
  const micros = Number(timestampUs % 1_000_000n);
  const d = new Date(ms);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}` +
    `T${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}` +
    `.${pad(micros, 6)}+00:00`
  );
}

export function formatFileStamp(date: Date) {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
