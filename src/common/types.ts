export const ObjectType = {
  X509Tbs: 0,
  X509Cert: 1,
  DevSeed: 2,
  CwtCert: 3,
  WasTbsHmac: 4,
  DeviceId: 5,
  GenericSeed: 6,
  PersoSha256Hash: 7,
} as const;
export type ObjectType = (typeof ObjectType)[keyof typeof ObjectType];

export const OBJECT_HEADER_SIZE = 2;
export const CERT_HEADER_SIZE = 2;
export const PERSO_BLOB_MAX_SIZE = 8192;
export const DEVICE_ID_SIZE = 32;
export const WAS_HMAC_SIZE = 32;
export const PERSO_SHA256_HASH_SIZE = 32;
export const CERT_NAME_MAX_SIZE = 15;
export const DEV_SEED_MAX_SIZE = 64;
export const CA_SUBJECT_KEY_SIZE = 20;

export interface ObjectHeader {
  /** Total object size in bytes, header included. */
  size: number;
  /** Object type; the wire may carry values outside {@link ObjectType}. */
  type: number;
}

export interface CertHeader {
  /** Bytes of the cert entry: sub-header, name and body. */
  size: number;
  nameSize: number;
}

/**
 * A single object located by the walker. `raw` spans the whole object and
 * `value` the bytes after the object header; both are views into the walked
 * buffer.
 */
export interface PersoObject {
  header: ObjectHeader;
  offset: number;
  raw: Uint8Array;
  value: Uint8Array;
}

export interface PersoBlob {
  numObjects: number;
  nextFree: number;
  body: Uint8Array;
}

export interface EndorseCertRequest {
  keyLabel: string;
  tbs: Uint8Array;
}

export interface EndorseCertResponse {
  keyLabel: string;
  cert: Uint8Array;
}

export interface Seed {
  raw: Uint8Array;
}

export interface Frame {
  payload: Uint8Array;
  size: number;
}
