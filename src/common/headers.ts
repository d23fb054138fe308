import type { CertHeader, ObjectHeader } from "./types.js";

/**
 * Both header kinds share one layout: a 12-bit size in the low bits and a
 * 4-bit discriminant in the high bits of a 16-bit word, stored big-endian.
 */
export const SIZE_FIELD_WIDTH = 12;
export const SIZE_FIELD_MASK = (1 << SIZE_FIELD_WIDTH) - 1;
export const TAG_FIELD_SHIFT = SIZE_FIELD_WIDTH;
export const TAG_FIELD_MASK = (1 << (16 - SIZE_FIELD_WIDTH)) - 1;

function packWord(size: number, tag: number): number {
  return (
    (((tag & TAG_FIELD_MASK) << TAG_FIELD_SHIFT) | (size & SIZE_FIELD_MASK)) &
    0xffff
  );
}

export function encodeObjectHeader(size: number, type: number): number {
  return packWord(size, type);
}

export function decodeObjectHeader(word: number): ObjectHeader {
  return {
    size: word & SIZE_FIELD_MASK,
    type: (word >>> TAG_FIELD_SHIFT) & TAG_FIELD_MASK,
  };
}

export function encodeCertHeader(size: number, nameSize: number): number {
  return packWord(size, nameSize);
}

export function decodeCertHeader(word: number): CertHeader {
  return {
    size: word & SIZE_FIELD_MASK,
    nameSize: (word >>> TAG_FIELD_SHIFT) & TAG_FIELD_MASK,
  };
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

// The only place where header words meet byte order.

export function readObjectHeader(bytes: Uint8Array, offset = 0): ObjectHeader {
  return decodeObjectHeader(viewOf(bytes).getUint16(offset, false));
}

export function writeObjectHeader(
  bytes: Uint8Array,
  offset: number,
  header: ObjectHeader,
): void {
  viewOf(bytes).setUint16(
    offset,
    encodeObjectHeader(header.size, header.type),
    false,
  );
}

export function readCertHeader(bytes: Uint8Array, offset = 0): CertHeader {
  return decodeCertHeader(viewOf(bytes).getUint16(offset, false));
}

export function writeCertHeader(
  bytes: Uint8Array,
  offset: number,
  header: CertHeader,
): void {
  viewOf(bytes).setUint16(
    offset,
    encodeCertHeader(header.size, header.nameSize),
    false,
  );
}
