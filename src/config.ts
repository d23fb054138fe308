import { z } from "zod";
import { LOG_LEVELS } from "./common/logger.js";
import { DEV_SEED_MAX_SIZE, PERSO_BLOB_MAX_SIZE } from "./common/types.js";
import type { UnpackOptions } from "./parser/blob-unpacker.js";

export const PersoConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default("info"),
  prettyLogs: z.boolean().default(false),
  frameCapacity: z.number().int().positive().default(2048),
  maxFramesPerCommand: z.number().int().positive().default(16),
  maxTbsCerts: z.number().int().nonnegative().default(10),
  maxCerts: z.number().int().nonnegative().default(10),
  maxSeeds: z.number().int().nonnegative().default(10),
  devSeedMaxSize: z
    .number()
    .int()
    .positive()
    .max(PERSO_BLOB_MAX_SIZE)
    .default(DEV_SEED_MAX_SIZE),
  requireSignature: z.boolean().default(true),
  requireTbsCert: z.boolean().default(true),
  requireNonZeroDeviceId: z.boolean().default(true),
  rmaTokenCrc: z.boolean().default(true),
});

export type PersoConfig = z.infer<typeof PersoConfigSchema>;

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      PERSO_LOG_LEVEL?: string;
      PERSO_PRETTY_LOGS?: string;
      PERSO_FRAME_CAPACITY?: string;
      PERSO_MAX_FRAMES?: string;
      PERSO_MAX_TBS_CERTS?: string;
      PERSO_MAX_CERTS?: string;
      PERSO_MAX_SEEDS?: string;
      PERSO_DEV_SEED_MAX_SIZE?: string;
      PERSO_REQUIRE_SIGNATURE?: string;
      PERSO_REQUIRE_TBS_CERT?: string;
      PERSO_REQUIRE_NON_ZERO_DEVICE_ID?: string;
      PERSO_RMA_TOKEN_CRC?: string;
    }
  }
}

export function parseConfigFromEnv(
  overrides: Partial<PersoConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): PersoConfig {
  const tryNumber = (n: string | undefined) =>
    n !== undefined ? Number(n) : undefined;
  // Anything other than "true"/"1" is false; unset keeps the default.
  const tryBoolean = (b: string | undefined) =>
    b !== undefined ? b === "true" || b === "1" : undefined;

  const config = PersoConfigSchema.parse({
    logLevel: env.PERSO_LOG_LEVEL,
    prettyLogs: tryBoolean(env.PERSO_PRETTY_LOGS),
    frameCapacity: tryNumber(env.PERSO_FRAME_CAPACITY),
    maxFramesPerCommand: tryNumber(env.PERSO_MAX_FRAMES),
    maxTbsCerts: tryNumber(env.PERSO_MAX_TBS_CERTS),
    maxCerts: tryNumber(env.PERSO_MAX_CERTS),
    maxSeeds: tryNumber(env.PERSO_MAX_SEEDS),
    devSeedMaxSize: tryNumber(env.PERSO_DEV_SEED_MAX_SIZE),
    requireSignature: tryBoolean(env.PERSO_REQUIRE_SIGNATURE),
    requireTbsCert: tryBoolean(env.PERSO_REQUIRE_TBS_CERT),
    requireNonZeroDeviceId: tryBoolean(env.PERSO_REQUIRE_NON_ZERO_DEVICE_ID),
    rmaTokenCrc: tryBoolean(env.PERSO_RMA_TOKEN_CRC),
  });

  return {
    ...config,
    ...overrides,
  };
}

export function unpackOptionsFromConfig(config: PersoConfig): UnpackOptions {
  return {
    maxTbsCerts: config.maxTbsCerts,
    maxCerts: config.maxCerts,
    maxSeeds: config.maxSeeds,
    devSeedMaxSize: config.devSeedMaxSize,
    policy: {
      requireSignature: config.requireSignature,
      requireTbsCert: config.requireTbsCert,
      requireNonZeroDeviceId: config.requireNonZeroDeviceId,
    },
  };
}
