import { crc32 } from "../common/checksum.js";
import { bytesToU64LE, encodeUtf8, u64LEToBytes } from "../common/codecs.js";
import {
  CrcMismatchError,
  InvalidCommandError,
  InvalidTokenError,
} from "../common/errors.js";
import { trimJsonString } from "../framing/frame-reassembler.js";
import { TOKEN_HASH_SIZE, parseCommand } from "./json-commands.js";
import { CrcEnvelopeSchema, RmaTokenJsonSchema } from "./schemas.js";

export const CRC_MARKER = '{"crc":';

export interface RmaTokenEncodeOptions {
  /** Leave out the trailing `{"crc": N}` object. */
  skipCrc?: boolean;
}

export interface RmaTokenDecodeOptions {
  /** Require the envelope and check it against the token JSON. */
  verifyCrc?: boolean;
}

/**
 * Encode a 16-byte RMA unlock token hash. The device console expects the
 * token object followed by a second object carrying the CRC-32 of the first.
 *
 * @example
 * rmaTokenToJson(token) // '{"hash":["8721","0"]}{"crc": 1234567890}'
 */
export function rmaTokenToJson(
  token: Uint8Array,
  options: RmaTokenEncodeOptions = {},
): string {
  if (token.byteLength !== TOKEN_HASH_SIZE) {
    throw new InvalidTokenError(
      "rma token hash",
      token.byteLength,
      TOKEN_HASH_SIZE,
    );
  }
  const json = JSON.stringify({
    hash: bytesToU64LE(token).map((w) => w.toString()),
  });
  if (options.skipCrc) {
    return json;
  }
  return `${json}{"crc": ${crc32(encodeUtf8(json))}}`;
}

export function rmaTokenFromJson(
  text: string,
  options: RmaTokenDecodeOptions = {},
): Uint8Array {
  const marker = text.indexOf(CRC_MARKER);
  const primary = trimJsonString(marker < 0 ? text : text.slice(0, marker));
  const cmd = parseCommand("RMA token", RmaTokenJsonSchema, primary);

  if (options.verifyCrc) {
    if (marker < 0) {
      throw new InvalidCommandError("RMA token", "missing crc envelope");
    }
    const envelope = parseCommand(
      "RMA token crc",
      CrcEnvelopeSchema,
      text.slice(marker),
    );
    const actual = crc32(encodeUtf8(primary));
    if (envelope.crc !== actual) {
      throw new CrcMismatchError(envelope.crc, actual);
    }
  }
  return u64LEToBytes(cmd.hash);
}
