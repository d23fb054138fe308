import type { Logger } from "pino";
import { PersoBlobBuilder, packPersoBlob } from "../builder/blob-packer.js";
import {
  type CaSubjectKeys,
  type Tokens,
  caSubjectKeysToJson,
  deviceIdFromJson,
  persoBlobFromJson,
  persoBlobToJson,
  tokensToJson,
} from "../commands/json-commands.js";
import { CRC_MARKER, rmaTokenToJson } from "../commands/rma-token.js";
import { toHex } from "../common/codecs.js";
import {
  MissingRequiredObjectError,
  OutputTooSmallError,
  PersoError,
} from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import type { EndorseCertResponse, Frame, Seed } from "../common/types.js";
import {
  type PersoConfig,
  parseConfigFromEnv,
  unpackOptionsFromConfig,
} from "../config.js";
import { FrameChunker } from "../framing/frame-chunker.js";
import {
  FrameReassembler,
  trimJsonString,
} from "../framing/frame-reassembler.js";
import {
  type UnpackedPersoBlob,
  unpackPersoBlob,
} from "../parser/blob-unpacker.js";
import type { EndorsementService, FrameTransport } from "./types.js";

function parses(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether `text` holds a whole command. A command carrying a CRC envelope is
 * complete only once both objects are; with `requireEnvelope` the envelope
 * must be present, since a frame boundary can fall right after the first.
 */
export function isCompleteCommand(
  text: string,
  requireEnvelope = false,
): boolean {
  const marker = text.indexOf(CRC_MARKER);
  if (marker < 0) {
    return !requireEnvelope && parses(trimJsonString(text));
  }
  return (
    parses(trimJsonString(text.slice(0, marker))) &&
    parses(trimJsonString(text.slice(marker)))
  );
}

/**
 * Read frames from `transport` until they add up to a complete command.
 *
 * @throws OutputTooSmallError when `maxFrames` frames do not complete it.
 * The command's real frame count is unknown at that point, so `need` is the
 * lower bound `maxFrames + 1`.
 */
export async function receiveCommand(
  transport: FrameTransport,
  maxFrames: number,
  requireEnvelope = false,
): Promise<string> {
  const frames: Frame[] = [];
  while (frames.length < maxFrames) {
    frames.push(await transport.receiveFrame());
    const text = FrameReassembler.reassembleText(frames);
    if (isCompleteCommand(text, requireEnvelope)) {
      return text;
    }
  }
  throw new OutputTooSmallError(maxFrames + 1, maxFrames);
}

export async function sendCommand(
  transport: FrameTransport,
  command: string,
  frameCapacity: number,
  maxFrames: number,
): Promise<number> {
  const frames = FrameChunker.chunk(command, frameCapacity, maxFrames);
  for (const frame of frames) {
    await transport.sendFrame(frame);
  }
  return frames.length;
}

export interface PersonalizeRequest {
  tokens: Tokens;
  caSubjectKeys: CaSubjectKeys;
  /** Sent after the tokens when present. */
  rmaToken?: Uint8Array;
}

export interface PersonalizeResult {
  cpDeviceId: Uint8Array;
  deviceId: Uint8Array | undefined;
  persoFwHash: Uint8Array | undefined;
  certs: EndorseCertResponse[];
  seeds: Seed[];
}

export interface PersoSessionOptions {
  config?: PersoConfig;
  logger?: Logger;
}

/**
 * Drives one device through personalization over a frame transport.
 * Each operation is one command exchange; `personalize` chains them.
 */
export class PersoSession {
  public readonly config: PersoConfig;
  public readonly log: Logger;

  public constructor(
    private readonly transport: FrameTransport,
    private readonly endorsement: EndorsementService,
    options: PersoSessionOptions = {},
  ) {
    this.config = options.config ?? parseConfigFromEnv();
    this.log =
      options.logger ??
      createLogger(this.config.logLevel, this.config.prettyLogs);
  }

  public async sendCommand(command: string): Promise<void> {
    const count = await sendCommand(
      this.transport,
      command,
      this.config.frameCapacity,
      this.config.maxFramesPerCommand,
    );
    this.log.debug({ bytes: command.length, frames: count }, "sent command");
  }

  public async receiveCommand(): Promise<string> {
    const text = await receiveCommand(
      this.transport,
      this.config.maxFramesPerCommand,
    );
    this.log.debug({ bytes: text.length }, "received command");
    return text;
  }

  public async sendTokens(tokens: Tokens): Promise<void> {
    await this.sendCommand(tokensToJson(tokens));
    this.log.info("tokens sent");
  }

  public async sendRmaToken(token: Uint8Array): Promise<void> {
    await this.sendCommand(
      rmaTokenToJson(token, { skipCrc: !this.config.rmaTokenCrc }),
    );
    this.log.info("RMA token sent");
  }

  public async sendCaSubjectKeys(keys: CaSubjectKeys): Promise<void> {
    await this.sendCommand(caSubjectKeysToJson(keys));
    this.log.info("CA subject keys sent");
  }

  public async readDeviceId(): Promise<Uint8Array> {
    const deviceId = deviceIdFromJson(await this.receiveCommand());
    this.log.info({ cpDeviceId: toHex(deviceId) }, "device id received");
    return deviceId;
  }

  public async receivePersoBlob(): Promise<UnpackedPersoBlob> {
    const blob = persoBlobFromJson(await this.receiveCommand());
    const unpacked = unpackPersoBlob(blob, {
      ...unpackOptionsFromConfig(this.config),
      logger: this.log,
    });
    this.log.info(
      {
        objects: blob.numObjects,
        bytes: blob.nextFree,
        tbsCerts: unpacked.tbsCerts.length,
        seeds: unpacked.seeds.length,
      },
      "perso blob received",
    );
    return unpacked;
  }

  /**
   * Pack endorsed certificates into a fresh blob and send it. A firmware
   * hash, when given, is appended after the certificates.
   */
  public async sendEndorsedCerts(
    certs: readonly EndorseCertResponse[],
    persoFwHash?: Uint8Array,
  ): Promise<void> {
    const blob = packPersoBlob(certs);
    if (persoFwHash) {
      new PersoBlobBuilder(blob).appendPersoFwHash(persoFwHash);
    }
    await this.sendCommand(persoBlobToJson(blob));
    this.log.info({ certs: certs.length }, "endorsed certificates sent");
  }

  public async personalize(
    request: PersonalizeRequest,
  ): Promise<PersonalizeResult> {
    try {
      await this.sendTokens(request.tokens);
      if (request.rmaToken) {
        await this.sendRmaToken(request.rmaToken);
      }
      await this.sendCaSubjectKeys(request.caSubjectKeys);
      const cpDeviceId = await this.readDeviceId();

      const unpacked = await this.receivePersoBlob();
      if (unpacked.signature === undefined) {
        throw new MissingRequiredObjectError("WasTbsHmac");
      }
      const certs = await this.endorsement.endorseCerts(
        unpacked.signature,
        unpacked.tbsCerts,
      );
      this.log.info(
        { certs: certs.map((c) => c.keyLabel) },
        "certificates endorsed",
      );
      await this.sendEndorsedCerts(certs);

      return {
        cpDeviceId,
        deviceId: unpacked.deviceId,
        persoFwHash: unpacked.persoFwHash,
        certs,
        seeds: unpacked.seeds,
      };
    } catch (err) {
      this.log.error(
        { kind: err instanceof PersoError ? err.kind : undefined, err },
        "personalization failed",
      );
      throw err;
    }
  }
}
