import type { z } from "zod";
import {
  bytesToU32LE,
  bytesToU64LE,
  u32LEToBytes,
  u64LEToBytes,
} from "../common/codecs.js";
import {
  BlobTooLargeError,
  EmptyBlobError,
  InvalidCommandError,
  InvalidTokenError,
} from "../common/errors.js";
import {
  CA_SUBJECT_KEY_SIZE,
  DEVICE_ID_SIZE,
  PERSO_BLOB_MAX_SIZE,
  type Frame,
  type PersoBlob,
} from "../common/types.js";
import { FrameChunker } from "../framing/frame-chunker.js";
import {
  FrameReassembler,
  trimJsonString,
} from "../framing/frame-reassembler.js";
import {
  CaSubjectKeysJsonSchema,
  DeviceIdJsonSchema,
  PersoBlobJsonSchema,
  TokensJsonSchema,
} from "./schemas.js";

export const WAFER_AUTH_SECRET_SIZE = 32;
export const TOKEN_HASH_SIZE = 16;

export interface Tokens {
  waferAuthSecret: Uint8Array;
  testUnlockToken: Uint8Array;
  testExitToken: Uint8Array;
}

export interface CaSubjectKeys {
  diceAuthKeyKeyId: Uint8Array;
  extAuthKeyKeyId: Uint8Array;
}

/**
 * Trim console noise, parse, and validate a command against its schema.
 * Fields the schema does not name are dropped.
 */
export function parseCommand<S extends z.ZodTypeAny>(
  command: string,
  schema: S,
  text: string,
): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(trimJsonString(text));
  } catch (err) {
    throw new InvalidCommandError(command, "malformed JSON", err);
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidCommandError(command, detail, result.error);
  }
  return result.data;
}

function checkSize(token: string, bytes: Uint8Array, want: number): void {
  if (bytes.byteLength !== want) {
    throw new InvalidTokenError(token, bytes.byteLength, want);
  }
}

function u64Strings(bytes: Uint8Array): string[] {
  return bytesToU64LE(bytes).map((w) => w.toString());
}

export function tokensToJson(tokens: Tokens): string {
  checkSize(
    "wafer_auth_secret",
    tokens.waferAuthSecret,
    WAFER_AUTH_SECRET_SIZE,
  );
  checkSize("test_unlock_token_hash", tokens.testUnlockToken, TOKEN_HASH_SIZE);
  checkSize("test_exit_token_hash", tokens.testExitToken, TOKEN_HASH_SIZE);
  return JSON.stringify({
    wafer_auth_secret: bytesToU32LE(tokens.waferAuthSecret),
    test_unlock_token_hash: u64Strings(tokens.testUnlockToken),
    test_exit_token_hash: u64Strings(tokens.testExitToken),
  });
}

export function tokensFromJson(text: string): Tokens {
  const cmd = parseCommand("tokens", TokensJsonSchema, text);
  return {
    waferAuthSecret: u32LEToBytes(cmd.wafer_auth_secret),
    testUnlockToken: u64LEToBytes(cmd.test_unlock_token_hash),
    testExitToken: u64LEToBytes(cmd.test_exit_token_hash),
  };
}

/**
 * Encode the CP device id (the hardware-origin prefix of the device id) as
 * little-endian 32-bit words.
 */
export function deviceIdToJson(cpDeviceId: Uint8Array): string {
  const size = cpDeviceId.byteLength;
  if (size % 4 !== 0 || size > DEVICE_ID_SIZE) {
    throw new InvalidCommandError(
      "device id",
      `cp device id of ${size} bytes is not a whole number of words ` +
        `up to ${DEVICE_ID_SIZE} bytes`,
    );
  }
  return JSON.stringify({ cp_device_id: bytesToU32LE(cpDeviceId) });
}

/**
 * @returns The 32-byte device id; words the command does not carry are zero.
 */
export function deviceIdFromJson(text: string): Uint8Array {
  const cmd = parseCommand("device id", DeviceIdJsonSchema, text);
  return u32LEToBytes(cmd.cp_device_id, DEVICE_ID_SIZE);
}

export function deviceIdFromFrames(frames: readonly Frame[]): Uint8Array {
  return deviceIdFromJson(FrameReassembler.reassembleText(frames));
}

export function caSubjectKeysToJson(keys: CaSubjectKeys): string {
  checkSize("dice_auth_key_key_id", keys.diceAuthKeyKeyId, CA_SUBJECT_KEY_SIZE);
  checkSize("ext_auth_key_key_id", keys.extAuthKeyKeyId, CA_SUBJECT_KEY_SIZE);
  return JSON.stringify({
    dice_auth_key_key_id: Array.from(keys.diceAuthKeyKeyId),
    ext_auth_key_key_id: Array.from(keys.extAuthKeyKeyId),
  });
}

export function caSubjectKeysFromJson(text: string): CaSubjectKeys {
  const cmd = parseCommand("CA subject keys", CaSubjectKeysJsonSchema, text);
  return {
    diceAuthKeyKeyId: Uint8Array.from(cmd.dice_auth_key_key_id),
    extAuthKeyKeyId: Uint8Array.from(cmd.ext_auth_key_key_id),
  };
}

/**
 * Encode the used region of a blob. The body array carries exactly
 * `next_free` bytes.
 */
export function persoBlobToJson(blob: PersoBlob): string {
  if (blob.numObjects === 0) {
    throw new EmptyBlobError();
  }
  const capacity = Math.min(blob.body.byteLength, PERSO_BLOB_MAX_SIZE);
  if (blob.nextFree > capacity) {
    throw new BlobTooLargeError(blob.nextFree, capacity);
  }
  return JSON.stringify({
    num_objs: blob.numObjects,
    next_free: blob.nextFree,
    body: Array.from(blob.body.subarray(0, blob.nextFree)),
  });
}

export function persoBlobFromJson(text: string): PersoBlob {
  const cmd = parseCommand("perso blob", PersoBlobJsonSchema, text);
  if (cmd.next_free > PERSO_BLOB_MAX_SIZE) {
    throw new BlobTooLargeError(cmd.next_free, PERSO_BLOB_MAX_SIZE);
  }
  const body = new Uint8Array(PERSO_BLOB_MAX_SIZE);
  body.set(cmd.body.slice(0, cmd.next_free));
  return { numObjects: cmd.num_objs, nextFree: cmd.next_free, body };
}

export function persoBlobToFrames(
  blob: PersoBlob,
  frameCapacity: number,
  maxFrames?: number,
): Frame[] {
  return FrameChunker.chunk(persoBlobToJson(blob), frameCapacity, maxFrames);
}

export function persoBlobFromFrames(frames: readonly Frame[]): PersoBlob {
  return persoBlobFromJson(FrameReassembler.reassembleText(frames));
}
