/** CRC-16/MCRF4XX (the "X.25" checksum MAVLink uses), seeded with 0xFFFF. */
export function crcAccumulate(byte: number, crc: number) {
  let tmp = (byte ^ (crc & 0xff)) & 0xff;
  tmp = (tmp ^ (tmp << 4)) & 0xff;
  return ((crc >> 8) ^ (tmp << 8) ^ (tmp << 3) ^ (tmp >> 4)) & 0xffff;
}

export function crcCalculate(bytes: Uint8Array, seed = 0xffff) {
  let crc = seed;
  for (const byte of bytes) crc = crcAccumulate(byte, crc);
  return crc;
}

export function frameChecksum(headerAndPayload: Uint8Array, crcExtra: number) {
  return crcAccumulate(crcExtra, crcCalculate(headerAndPayload));
}
