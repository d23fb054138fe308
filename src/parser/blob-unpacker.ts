import type { Logger } from "pino";
import { decodeAscii, isAllZero } from "../common/codecs.js";
import {
  BlobTooLargeError,
  EmptyBlobError,
  MalformedCertEntryError,
  MissingRequiredObjectError,
  SeedTooLargeError,
  TooManyCertsError,
  TooManySeedsError,
  UnexpectedObjectSizeError,
  ZeroDeviceIdError,
  objectTypeName,
} from "../common/errors.js";
import { readCertHeader } from "../common/headers.js";
import {
  CERT_HEADER_SIZE,
  DEVICE_ID_SIZE,
  DEV_SEED_MAX_SIZE,
  OBJECT_HEADER_SIZE,
  ObjectType,
  PERSO_BLOB_MAX_SIZE,
  PERSO_SHA256_HASH_SIZE,
  WAS_HMAC_SIZE,
  type EndorseCertRequest,
  type EndorseCertResponse,
  type ObjectHeader,
  type PersoBlob,
  type PersoObject,
  type Seed,
} from "../common/types.js";
import { ObjectWalker } from "./object-walker.js";

/**
 * Checks applied after the walk. They reject blobs a personalization run
 * cannot use; sessions that only move seeds can relax them.
 */
export interface UnpackPolicy {
  readonly requireSignature: boolean;
  readonly requireTbsCert: boolean;
  readonly requireNonZeroDeviceId: boolean;
}

export const STRICT_UNPACK_POLICY: UnpackPolicy = {
  requireSignature: true,
  requireTbsCert: true,
  requireNonZeroDeviceId: true,
};

export const LENIENT_UNPACK_POLICY: UnpackPolicy = {
  requireSignature: false,
  requireTbsCert: false,
  requireNonZeroDeviceId: false,
};

export interface UnpackOptions {
  readonly maxTbsCerts?: number;
  readonly maxCerts?: number;
  readonly maxSeeds?: number;
  readonly devSeedMaxSize?: number;
  readonly policy?: Partial<UnpackPolicy>;
  readonly logger?: Logger;
}

export interface CertEntry {
  keyLabel: string;
  body: Uint8Array;
}

export interface UnpackedPersoBlob {
  deviceId: Uint8Array | undefined;
  signature: Uint8Array | undefined;
  persoFwHash: Uint8Array | undefined;
  tbsCerts: EndorseCertRequest[];
  certs: EndorseCertResponse[];
  seeds: Seed[];
  /** Headers of objects the unpacker does not extract, in wire order. */
  skipped: ObjectHeader[];
}

/**
 * Parse the cert entry nested in an X509Tbs or X509Cert object. The body is
 * copied out of the walked buffer.
 */
export function parseCertEntry(object: PersoObject): CertEntry {
  const { value } = object;
  if (value.byteLength < CERT_HEADER_SIZE) {
    throw new MalformedCertEntryError(CERT_HEADER_SIZE, value.byteLength);
  }
  const certHeader = readCertHeader(value);
  const bodyStart = CERT_HEADER_SIZE + certHeader.nameSize;
  if (certHeader.size < bodyStart || certHeader.size > value.byteLength) {
    throw new MalformedCertEntryError(certHeader.size, value.byteLength);
  }
  const label = value.subarray(CERT_HEADER_SIZE, bodyStart);
  if (label.some((byte) => byte > 0x7f)) {
    throw new MalformedCertEntryError(
      certHeader.size,
      value.byteLength,
      "key label is not ASCII",
    );
  }
  return {
    keyLabel: decodeAscii(label),
    body: value.slice(bodyStart, certHeader.size),
  };
}

/**
 * Extracts typed provisioning records from a personalization blob.
 * Capacity limits mirror the fixed output arrays of the device-side API:
 * exceeding one fails the call instead of truncating.
 */
export class PersoBlobParser {
  public readonly maxTbsCerts: number;
  public readonly maxCerts: number;
  public readonly maxSeeds: number;
  public readonly devSeedMaxSize: number;
  public readonly policy: UnpackPolicy;
  private readonly logger: Logger | undefined;

  public constructor(options?: UnpackOptions) {
    this.maxTbsCerts = options?.maxTbsCerts ?? 10;
    this.maxCerts = options?.maxCerts ?? 10;
    this.maxSeeds = options?.maxSeeds ?? 10;
    this.devSeedMaxSize = options?.devSeedMaxSize ?? DEV_SEED_MAX_SIZE;
    this.policy = { ...STRICT_UNPACK_POLICY, ...options?.policy };
    this.logger = options?.logger;
  }

  public parse(
    blob: PersoBlob | Uint8Array | null | undefined,
  ): UnpackedPersoBlob {
    const { body, length } = this.checkBlob(blob);

    const out: UnpackedPersoBlob = {
      deviceId: undefined,
      signature: undefined,
      persoFwHash: undefined,
      tbsCerts: [],
      certs: [],
      seeds: [],
      skipped: [],
    };

    for (const object of ObjectWalker.walk(body, length)) {
      const { header, value } = object;
      switch (header.type) {
        case ObjectType.DeviceId:
          out.deviceId = this.readFixed(object, DEVICE_ID_SIZE);
          break;
        case ObjectType.WasTbsHmac:
          out.signature = this.readFixed(object, WAS_HMAC_SIZE);
          break;
        case ObjectType.PersoSha256Hash:
          // Not a required record; a hash of another size is skipped.
          if (header.size === OBJECT_HEADER_SIZE + PERSO_SHA256_HASH_SIZE) {
            out.persoFwHash = value.slice();
          } else {
            this.skip(object, out);
          }
          break;
        case ObjectType.X509Tbs: {
          if (out.tbsCerts.length >= this.maxTbsCerts) {
            throw new TooManyCertsError(this.maxTbsCerts);
          }
          const entry = parseCertEntry(object);
          out.tbsCerts.push({ keyLabel: entry.keyLabel, tbs: entry.body });
          break;
        }
        case ObjectType.X509Cert: {
          if (out.certs.length >= this.maxCerts) {
            throw new TooManyCertsError(this.maxCerts);
          }
          const entry = parseCertEntry(object);
          out.certs.push({ keyLabel: entry.keyLabel, cert: entry.body });
          break;
        }
        case ObjectType.DevSeed:
          if (out.seeds.length >= this.maxSeeds) {
            throw new TooManySeedsError(this.maxSeeds);
          }
          if (value.byteLength > this.devSeedMaxSize) {
            throw new SeedTooLargeError(value.byteLength, this.devSeedMaxSize);
          }
          out.seeds.push({ raw: value.slice() });
          break;
        default:
          // CwtCert, GenericSeed and types this codec does not know yet.
          this.skip(object, out);
      }
    }

    this.checkPostconditions(out);
    return out;
  }

  private checkBlob(blob: PersoBlob | Uint8Array | null | undefined): {
    body: Uint8Array;
    length: number;
  } {
    if (blob === null || blob === undefined) {
      throw new EmptyBlobError();
    }
    const body = blob instanceof Uint8Array ? blob : blob.body;
    const length = blob instanceof Uint8Array ? blob.byteLength : blob.nextFree;
    if (length === 0) {
      throw new EmptyBlobError();
    }
    if (length > PERSO_BLOB_MAX_SIZE) {
      throw new BlobTooLargeError(length, PERSO_BLOB_MAX_SIZE);
    }
    if (length > body.byteLength) {
      throw new BlobTooLargeError(length, body.byteLength);
    }
    return { body, length };
  }

  private skip(object: PersoObject, out: UnpackedPersoBlob): void {
    const { header, offset } = object;
    this.logger?.debug(
      { type: objectTypeName(header.type), size: header.size, offset },
      "skipping perso object",
    );
    out.skipped.push(header);
  }

  private readFixed(object: PersoObject, size: number): Uint8Array {
    const want = size + OBJECT_HEADER_SIZE;
    if (object.header.size !== want) {
      throw new UnexpectedObjectSizeError(
        object.header.type,
        object.header.size,
        want,
      );
    }
    return object.value.slice();
  }

  private checkPostconditions(out: UnpackedPersoBlob): void {
    if (this.policy.requireSignature && out.signature === undefined) {
      throw new MissingRequiredObjectError("WasTbsHmac");
    }
    if (this.policy.requireTbsCert && out.tbsCerts.length === 0) {
      throw new MissingRequiredObjectError("X509Tbs");
    }
    if (
      this.policy.requireNonZeroDeviceId &&
      (out.deviceId === undefined || isAllZero(out.deviceId))
    ) {
      throw new ZeroDeviceIdError();
    }
  }
}

export function unpackPersoBlob(
  blob: PersoBlob | Uint8Array | null | undefined,
  options?: UnpackOptions,
): UnpackedPersoBlob {
  return new PersoBlobParser(options).parse(blob);
}
