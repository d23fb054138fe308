import { concatBytes, decodeUtf8 } from "../common/codecs.js";
import type { Frame } from "../common/types.js";

const OPEN_BRACE = 0x7b; // {
const OPEN_BRACKET = 0x5b; // [
const CLOSE_BRACE = 0x7d; // }
const CLOSE_BRACKET = 0x5d; // ]

function firstOf(bytes: Uint8Array, a: number, b: number): number {
  const i = bytes.indexOf(a);
  const j = bytes.indexOf(b);
  if (i < 0) return j;
  if (j < 0) return i;
  return Math.min(i, j);
}

function lastOf(bytes: Uint8Array, a: number, b: number): number {
  return Math.max(bytes.lastIndexOf(a), bytes.lastIndexOf(b));
}

/**
 * Rebuilds a command from the frames that carried it. Frame count and order
 * are the caller's concern.
 */
export class FrameReassembler {
  public static reassemble(frames: readonly Frame[]): Uint8Array {
    return concatBytes(
      frames.map((frame, i) => {
        if (frame.size < 0 || frame.size > frame.payload.byteLength) {
          throw new RangeError(
            `frame ${i} size ${frame.size} exceeds payload of ` +
              `${frame.payload.byteLength} bytes`,
          );
        }
        return frame.payload.subarray(0, frame.size);
      }),
    );
  }

  public static reassembleText(frames: readonly Frame[]): string {
    return decodeUtf8(FrameReassembler.reassemble(frames));
  }

  /**
   * Cut console noise around an embedded JSON value: everything before the
   * first `{` or `[` and after the last `}` or `]`. Input without both
   * delimiter classes comes back unchanged (same reference).
   */
  public static trimToJson(bytes: Uint8Array): Uint8Array {
    const start = firstOf(bytes, OPEN_BRACE, OPEN_BRACKET);
    const end = lastOf(bytes, CLOSE_BRACE, CLOSE_BRACKET);
    if (start < 0 || end < 0 || end < start) {
      return bytes;
    }
    return bytes.subarray(start, end + 1);
  }
}

export function trimJsonString(text: string): string {
  const starts = [text.indexOf("{"), text.indexOf("[")].filter((i) => i >= 0);
  const end = Math.max(text.lastIndexOf("}"), text.lastIndexOf("]"));
  if (starts.length === 0 || end < 0) {
    return text;
  }
  const start = Math.min(...starts);
  if (end < start) {
    return text;
  }
  return text.slice(start, end + 1);
}
