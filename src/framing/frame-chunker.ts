import { encodeUtf8 } from "../common/codecs.js";
import { OutputTooSmallError } from "../common/errors.js";
import type { Frame } from "../common/types.js";

const SPACE = 0x20;

function checkCapacity(frameCapacity: number): void {
  if (!Number.isInteger(frameCapacity) || frameCapacity <= 0) {
    throw new RangeError(
      `frame capacity must be a positive integer; got ${frameCapacity}`,
    );
  }
}

function asBytes(command: Uint8Array | string): Uint8Array {
  return typeof command === "string" ? encodeUtf8(command) : command;
}

/**
 * Splits serialized commands into fixed-capacity transport frames. The
 * content is copied verbatim; this layer does not look at it.
 */
export class FrameChunker {
  /**
   * Number of frames needed to carry `byteLength` bytes.
   */
  public static frameCount(byteLength: number, frameCapacity: number): number {
    checkCapacity(frameCapacity);
    return Math.ceil(byteLength / frameCapacity);
  }

  /**
   * @param command - Serialized command; strings are UTF-8 encoded.
   * @param frameCapacity - Payload capacity of every frame.
   * @param maxFrames - Frame slots available to the caller.
   * @returns Frames in transmission order; none for an empty command.
   * @throws OutputTooSmallError before producing any frame when the command
   *   needs more than `maxFrames` frames.
   */
  public static chunk(
    command: Uint8Array | string,
    frameCapacity: number,
    maxFrames = Number.POSITIVE_INFINITY,
  ): Frame[] {
    const bytes = asBytes(command);
    const count = FrameChunker.frameCount(bytes.byteLength, frameCapacity);
    if (count > maxFrames) {
      throw new OutputTooSmallError(count, maxFrames);
    }

    const frames: Frame[] = [];
    for (let i = 0; i < count; i++) {
      const offset = i * frameCapacity;
      const size = Math.min(frameCapacity, bytes.byteLength - offset);
      const payload = new Uint8Array(frameCapacity);
      payload.set(bytes.subarray(offset, offset + size));
      frames.push({ payload, size });
    }
    return frames;
  }

  /**
   * Place a command that must travel in a single frame. Unused payload bytes
   * are filled with ASCII spaces, which the console ignores.
   */
  public static toFrame(
    command: Uint8Array | string,
    frameCapacity: number,
  ): Frame {
    checkCapacity(frameCapacity);
    const bytes = asBytes(command);
    if (bytes.byteLength > frameCapacity) {
      throw new OutputTooSmallError(bytes.byteLength, frameCapacity);
    }
    const payload = new Uint8Array(frameCapacity).fill(SPACE);
    payload.set(bytes);
    return { payload, size: bytes.byteLength };
  }
}
