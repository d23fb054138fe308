/**
 * Byte helpers shared by the blob codec and the JSON command adapter.
 */

export function toHex(input: ArrayBuffer | Uint8Array): string {
  const bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, c) => sum + c.byteLength, 0);
  const out = new Uint8Array(total);
  let off = 0;
  for (const c of chunks) {
    out.set(c, off);
    off += c.byteLength;
  }
  return out;
}

export function encodeUtf8(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder("utf-8").decode(bytes);
}

// The "ascii" label maps to windows-1252; bytes above 0x7f do not round-trip.
export function decodeAscii(bytes: Uint8Array): string {
  return new TextDecoder("ascii").decode(bytes);
}

/**
 * Key labels travel without a terminator; callers that need the fixed-size
 * form get it NUL-padded to `capacity` bytes.
 */
export function keyLabelToBytes(label: string, capacity = 16): Uint8Array {
  const encoded = encodeUtf8(label);
  if (encoded.byteLength > capacity) {
    throw new RangeError(
      `key label '${label}' is ${encoded.byteLength} bytes; ` +
        `capacity is ${capacity}`,
    );
  }
  const out = new Uint8Array(capacity);
  out.set(encoded);
  return out;
}

export function isAllZero(bytes: Uint8Array): boolean {
  return bytes.every((b) => b === 0);
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function bytesToU32LE(bytes: Uint8Array): number[] {
  if (bytes.byteLength % 4 !== 0) {
    throw new RangeError(
      `byte length ${bytes.byteLength} is not a multiple of 4`,
    );
  }
  const view = viewOf(bytes);
  const words: number[] = [];
  for (let i = 0; i < bytes.byteLength; i += 4) {
    words.push(view.getUint32(i, true));
  }
  return words;
}

export function u32LEToBytes(
  words: readonly number[],
  size = words.length * 4,
): Uint8Array {
  if (words.length * 4 > size) {
    throw new RangeError(`${words.length} words do not fit in ${size} bytes`);
  }
  const out = new Uint8Array(size);
  const view = viewOf(out);
  words.forEach((w, i) => view.setUint32(i * 4, w, true));
  return out;
}

export function bytesToU64LE(bytes: Uint8Array): bigint[] {
  if (bytes.byteLength % 8 !== 0) {
    throw new RangeError(
      `byte length ${bytes.byteLength} is not a multiple of 8`,
    );
  }
  const view = viewOf(bytes);
  const words: bigint[] = [];
  for (let i = 0; i < bytes.byteLength; i += 8) {
    words.push(view.getBigUint64(i, true));
  }
  return words;
}

export function u64LEToBytes(words: readonly bigint[]): Uint8Array {
  const out = new Uint8Array(words.length * 8);
  const view = viewOf(out);
  words.forEach((w, i) => view.setBigUint64(i * 8, w, true));
  return out;
}
