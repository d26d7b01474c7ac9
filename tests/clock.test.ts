import { describe, it, expect } from 'vitest';
import { createMonotonicClock, formatFileStamp, formatIsoMicros } from '../src/clock.js';

describe('clock', () => {
  it('formats microsecond timestamps as ISO-8601 with a UTC offset', () => {
    expect(formatIsoMicros(1_700_000_000_123_456n)).toBe('2023-11-14T22:13:20.123456+00:00');
    expect(formatIsoMicros(0n)).toBe('1970-01-01T00:00:00.000000+00:00');
    expect(formatIsoMicros(1_000_001n)).toBe('1970-01-01T00:00:01.000001+00:00');
  });

  it('formats file stamps from local time', () => {
    expect(formatFileStamp(new Date(2024, 4, 1, 12, 3, 9))).toBe('20240501_120309');
  });

  it('never goes backwards and stays close to wall-clock time', () => {
    const clock = createMonotonicClock();
    const readings = Array.from({ length: 1000 }, () => clock());
    for (let i = 1; i < readings.length; i++) expect(readings[i] >= readings[i - 1]).toBe(true);

    const driftUs = readings[0] - BigInt(Date.now()) * 1000n;
    expect(driftUs < 1_000_000n && driftUs > -1_000_000n).toBe(true);
  });
});
