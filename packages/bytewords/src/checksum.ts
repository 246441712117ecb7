import { bytesEqual, concatBytes, u32be } from "./internal/bytes.js";

export const CHECKSUM_LEN = 4;

const CRC32_POLYNOMIAL = 0xedb88320;

const CRC32_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i += 1) {
    let crc = i;
    for (let bit = 0; bit < 8; bit += 1) {
      crc = crc & 1 ? (crc >>> 1) ^ CRC32_POLYNOMIAL : crc >>> 1;
    }
    table[i] = crc >>> 0;
  }
  return table;
})();

/** CRC-32 (IEEE) of `bytes`, as an unsigned 32-bit integer. */
export function crc32(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (const b of bytes) {
    crc = (crc >>> 8) ^ CRC32_TABLE[(crc ^ b) & 0xff];
  }
  return (crc ^ 0xffffffff) >>> 0;
}

export function computeChecksum(body: Uint8Array): Uint8Array {
  return u32be(crc32(body));
}

export function appendChecksum(body: Uint8Array): Uint8Array {
  return concatBytes(body, computeChecksum(body));
}

export function verifyChecksum(body: Uint8Array, checksum: Uint8Array): boolean {
  return bytesEqual(computeChecksum(body), checksum);
}
