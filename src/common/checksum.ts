import CRC32 from "crc-32";

/**
 * Standard reflected CRC-32 (polynomial 0xEDB88320), as an unsigned value.
 */
export function crc32(data: Uint8Array): number {
  return CRC32.buf(data) >>> 0;
}
