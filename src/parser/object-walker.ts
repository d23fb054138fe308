import { readObjectHeader } from "../common/headers.js";
import {
  ObjectOverflowError,
  TruncatedHeaderError,
} from "../common/errors.js";
import { OBJECT_HEADER_SIZE, type PersoObject } from "../common/types.js";

/**
 * Iterates a flat buffer as a sequence of perso TLV objects.
 *
 * Each iteration starts from offset zero, so one walker can be consumed any
 * number of times. Every step is bounds-checked against the logical length
 * before a byte of the object is touched.
 */
export class ObjectWalker implements Iterable<PersoObject> {
  public readonly buffer: Uint8Array;
  public readonly length: number;

  /**
   * @param buffer - Bytes holding the objects.
   * @param length - Logical length (`nextFree`); defaults to the whole buffer.
   */
  public constructor(buffer: Uint8Array, length = buffer.byteLength) {
    ObjectWalker.checkLength(buffer, length);
    this.buffer = buffer;
    this.length = length;
  }

  public [Symbol.iterator](): Iterator<PersoObject> {
    return ObjectWalker.walk(this.buffer, this.length);
  }

  /**
   * Lazily yield the objects in `buffer[0:length]`.
   * @throws ObjectOverflowError when a header declares a size of zero, a size
   *   smaller than the header, or more bytes than remain.
   * @throws TruncatedHeaderError when a non-empty tail cannot hold a header.
   */
  public static *walk(
    buffer: Uint8Array,
    length = buffer.byteLength,
  ): Generator<PersoObject, void, undefined> {
    ObjectWalker.checkLength(buffer, length);
    let offset = 0;
    while (length - offset >= OBJECT_HEADER_SIZE) {
      const remaining = length - offset;
      const header = readObjectHeader(buffer, offset);
      if (header.size < OBJECT_HEADER_SIZE || header.size > remaining) {
        throw new ObjectOverflowError(header.size, remaining);
      }
      const raw = buffer.subarray(offset, offset + header.size);
      yield {
        header,
        offset,
        raw,
        value: raw.subarray(OBJECT_HEADER_SIZE),
      };
      offset += header.size;
    }
    if (length - offset !== 0) {
      throw new TruncatedHeaderError(length - offset);
    }
  }

  private static checkLength(buffer: Uint8Array, length: number): void {
    if (!Number.isInteger(length) || length < 0 || length > buffer.byteLength) {
      throw new RangeError(
        `logical length ${length} is outside buffer of ` +
          `${buffer.byteLength} bytes`,
      );
    }
  }

  /**
   * Walk the whole buffer eagerly.
   * @returns Every object in wire order.
   */
  public static parse(
    buffer: Uint8Array,
    length = buffer.byteLength,
  ): PersoObject[] {
    return Array.from(new ObjectWalker(buffer, length));
  }
}
