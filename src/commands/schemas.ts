import { z } from "zod";
import { CA_SUBJECT_KEY_SIZE } from "../common/types.js";

const U64_MAX = (1n << 64n) - 1n;

export const ByteSchema = z.number().int().min(0).max(0xff);

export const U32Schema = z.number().int().min(0).max(0xffffffff);

/**
 * 64-bit words are written as decimal strings, the protobuf JSON mapping for
 * uint64; plain numbers are accepted while they are exact.
 */
export const U64Schema = z
  .union([
    z.string().regex(/^\d{1,20}$/),
    z.number().int().nonnegative().safe(),
  ])
  .transform((v) => BigInt(v))
  .refine((v) => v <= U64_MAX, { message: "value exceeds uint64" });

export const TokensJsonSchema = z.object({
  wafer_auth_secret: z.array(U32Schema).length(8),
  test_unlock_token_hash: z.array(U64Schema).length(2),
  test_exit_token_hash: z.array(U64Schema).length(2),
});
export type TokensJson = z.input<typeof TokensJsonSchema>;

export const DeviceIdJsonSchema = z.object({
  cp_device_id: z.array(U32Schema).max(8),
});
export type DeviceIdJson = z.input<typeof DeviceIdJsonSchema>;

export const CaSubjectKeysJsonSchema = z.object({
  dice_auth_key_key_id: z.array(ByteSchema).length(CA_SUBJECT_KEY_SIZE),
  ext_auth_key_key_id: z.array(ByteSchema).length(CA_SUBJECT_KEY_SIZE),
});
export type CaSubjectKeysJson = z.input<typeof CaSubjectKeysJsonSchema>;

export const RmaTokenJsonSchema = z.object({
  hash: z.array(U64Schema).length(2),
});
export type RmaTokenJson = z.input<typeof RmaTokenJsonSchema>;

export const PersoBlobJsonSchema = z
  .object({
    num_objs: U32Schema,
    next_free: U32Schema,
    body: z.array(ByteSchema),
  })
  .refine((v) => v.next_free <= v.body.length, {
    message: "next_free is larger than body",
    path: ["next_free"],
  });
export type PersoBlobJson = z.input<typeof PersoBlobJsonSchema>;

export const CrcEnvelopeSchema = z.object({
  crc: U32Schema,
});
