import { encodeUtf8 } from "../common/codecs.js";
import {
  BlobFullError,
  InvalidCertError,
  SeedTooLargeError,
  UnexpectedObjectSizeError,
} from "../common/errors.js";
import {
  SIZE_FIELD_MASK,
  writeCertHeader,
  writeObjectHeader,
} from "../common/headers.js";
import {
  CERT_HEADER_SIZE,
  CERT_NAME_MAX_SIZE,
  DEVICE_ID_SIZE,
  DEV_SEED_MAX_SIZE,
  OBJECT_HEADER_SIZE,
  ObjectType,
  PERSO_BLOB_MAX_SIZE,
  PERSO_SHA256_HASH_SIZE,
  WAS_HMAC_SIZE,
  type EndorseCertRequest,
  type EndorseCertResponse,
  type PersoBlob,
  type Seed,
} from "../common/types.js";

const ASCII = /^[\x00-\x7f]*$/;

export function createPersoBlob(capacity = PERSO_BLOB_MAX_SIZE): PersoBlob {
  if (
    !Number.isInteger(capacity) ||
    capacity <= 0 ||
    capacity > PERSO_BLOB_MAX_SIZE
  ) {
    throw new RangeError(
      `blob capacity must be in [1, ${PERSO_BLOB_MAX_SIZE}]; got ${capacity}`,
    );
  }
  return { numObjects: 0, nextFree: 0, body: new Uint8Array(capacity) };
}

/**
 * Appends perso TLV objects to a blob.
 *
 * Writing is append-only: each object is validated and bounds-checked before
 * any byte is written, and a failed append leaves earlier objects in place.
 */
export class PersoBlobBuilder {
  public readonly blob: PersoBlob;

  public constructor(blob: PersoBlob = createPersoBlob()) {
    this.blob = blob;
  }

  public appendDeviceId(deviceId: Uint8Array): this {
    return this.appendFixed(ObjectType.DeviceId, deviceId, DEVICE_ID_SIZE);
  }

  public appendSignature(signature: Uint8Array): this {
    return this.appendFixed(ObjectType.WasTbsHmac, signature, WAS_HMAC_SIZE);
  }

  public appendPersoFwHash(hash: Uint8Array): this {
    return this.appendFixed(
      ObjectType.PersoSha256Hash,
      hash,
      PERSO_SHA256_HASH_SIZE,
    );
  }

  public appendTbsCert(request: EndorseCertRequest): this {
    return this.appendCertEntry(
      ObjectType.X509Tbs,
      request.keyLabel,
      request.tbs,
    );
  }

  public appendCert(response: EndorseCertResponse): this {
    return this.appendCertEntry(
      ObjectType.X509Cert,
      response.keyLabel,
      response.cert,
    );
  }

  public appendSeed(seed: Seed): this {
    if (seed.raw.byteLength > DEV_SEED_MAX_SIZE) {
      throw new SeedTooLargeError(seed.raw.byteLength, DEV_SEED_MAX_SIZE);
    }
    const offset = this.reserve(
      ObjectType.DevSeed,
      OBJECT_HEADER_SIZE + seed.raw.byteLength,
    );
    this.blob.body.set(seed.raw, offset + OBJECT_HEADER_SIZE);
    return this;
  }

  /** Copy of the used region, `body[0:nextFree]`. */
  public bytes(): Uint8Array {
    return this.blob.body.slice(0, this.blob.nextFree);
  }

  private appendFixed(type: ObjectType, bytes: Uint8Array, size: number): this {
    if (bytes.byteLength !== size) {
      throw new UnexpectedObjectSizeError(
        type,
        bytes.byteLength + OBJECT_HEADER_SIZE,
        size + OBJECT_HEADER_SIZE,
      );
    }
    const offset = this.reserve(type, OBJECT_HEADER_SIZE + size);
    this.blob.body.set(bytes, offset + OBJECT_HEADER_SIZE);
    return this;
  }

  private appendCertEntry(
    type: ObjectType,
    keyLabel: string,
    body: Uint8Array,
  ): this {
    if (body.byteLength === 0) {
      throw new InvalidCertError(`empty body for '${keyLabel}'`);
    }
    if (!ASCII.test(keyLabel)) {
      throw new InvalidCertError(`key label '${keyLabel}' is not ASCII`);
    }
    const name = encodeUtf8(keyLabel);
    if (name.byteLength > CERT_NAME_MAX_SIZE) {
      throw new InvalidCertError(
        `key label '${keyLabel}' is ${name.byteLength} bytes; ` +
          `max ${CERT_NAME_MAX_SIZE}`,
      );
    }
    const entrySize = CERT_HEADER_SIZE + name.byteLength + body.byteLength;
    const objSize = OBJECT_HEADER_SIZE + entrySize;
    if (objSize > SIZE_FIELD_MASK) {
      throw new InvalidCertError(
        `object size ${objSize} for '${keyLabel}' exceeds ${SIZE_FIELD_MASK}`,
      );
    }

    const offset = this.reserve(type, objSize);
    const entryOffset = offset + OBJECT_HEADER_SIZE;
    writeCertHeader(this.blob.body, entryOffset, {
      size: entrySize,
      nameSize: name.byteLength,
    });
    this.blob.body.set(name, entryOffset + CERT_HEADER_SIZE);
    this.blob.body.set(body, entryOffset + CERT_HEADER_SIZE + name.byteLength);
    return this;
  }

  // Writes the object header and claims `objSize` bytes; returns its offset.
  // A body longer than the protocol maximum still holds only that many bytes.
  private reserve(type: ObjectType, objSize: number): number {
    const { blob } = this;
    const capacity = Math.min(blob.body.byteLength, PERSO_BLOB_MAX_SIZE);
    if (blob.nextFree + objSize > capacity) {
      throw new BlobFullError(blob.nextFree, objSize, capacity);
    }
    const offset = blob.nextFree;
    writeObjectHeader(blob.body, offset, { size: objSize, type });
    blob.nextFree += objSize;
    blob.numObjects++;
    return offset;
  }
}

/**
 * Append endorsed certificates to `blob` (a fresh blob when omitted) as
 * X509Cert objects. On failure the blob keeps every certificate appended
 * before the failing one.
 */
export function packPersoBlob(
  certs: readonly EndorseCertResponse[],
  blob: PersoBlob = createPersoBlob(),
): PersoBlob {
  if (certs.length === 0) {
    throw new InvalidCertError("no certificates to pack");
  }
  const builder = new PersoBlobBuilder(blob);
  for (const cert of certs) {
    builder.appendCert(cert);
  }
  return builder.blob;
}

export interface PersoBlobContents {
  deviceId?: Uint8Array;
  signature?: Uint8Array;
  persoFwHash?: Uint8Array;
  tbsCerts?: readonly EndorseCertRequest[];
  certs?: readonly EndorseCertResponse[];
  seeds?: readonly Seed[];
}

/**
 * Serialize a full record set the way the device lays it out: device id,
 * signature, firmware hash, TBS certificates, endorsed certificates, seeds.
 */
export function buildPersoBlob(
  contents: PersoBlobContents,
  capacity = PERSO_BLOB_MAX_SIZE,
): PersoBlob {
  const builder = new PersoBlobBuilder(createPersoBlob(capacity));
  if (contents.deviceId) builder.appendDeviceId(contents.deviceId);
  if (contents.signature) builder.appendSignature(contents.signature);
  if (contents.persoFwHash) builder.appendPersoFwHash(contents.persoFwHash);
  for (const tbs of contents.tbsCerts ?? []) builder.appendTbsCert(tbs);
  for (const cert of contents.certs ?? []) builder.appendCert(cert);
  for (const seed of contents.seeds ?? []) builder.appendSeed(seed);
  return builder.blob;
}
