import { ObjectType } from "./types.js";

const objectTypeNames = new Map<number, string>(
  Object.entries(ObjectType).map(([name, value]) => [value, name]),
);

export function objectTypeName(type: number): string {
  return objectTypeNames.get(type) ?? `Unknown(${type})`;
}

/**
 * Base class for every failure raised by the codec, the command adapter and
 * the session. `kind` is stable and safe to switch on.
 */
export abstract class PersoError extends Error {
  abstract readonly kind: string;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class EmptyBlobError extends PersoError {
  readonly kind = "EMPTY_BLOB";

  constructor() {
    super("invalid personalization blob: empty");
  }
}

export class BlobTooLargeError extends PersoError {
  readonly kind = "BLOB_TOO_LARGE";

  constructor(
    readonly got: number,
    readonly max: number,
  ) {
    super(`blob size ${got} exceeds max ${max}`);
  }
}

export class TruncatedHeaderError extends PersoError {
  readonly kind = "TRUNCATED_HEADER";

  constructor(readonly remaining: number) {
    super("remaining buffer too small for object header");
  }
}

export class ObjectOverflowError extends PersoError {
  readonly kind = "OBJECT_OVERFLOW";

  constructor(
    readonly declared: number,
    readonly remaining: number,
  ) {
    super(
      declared > remaining
        ? `object size ${declared} exceeds remaining buffer ${remaining}`
        : `object size ${declared} is smaller than the object header`,
    );
  }
}

export class UnexpectedObjectSizeError extends PersoError {
  readonly kind = "UNEXPECTED_OBJECT_SIZE";

  constructor(
    readonly objectType: number,
    readonly got: number,
    readonly want: number,
  ) {
    super(
      `unexpected ${objectTypeName(objectType)} object size ${got}, ` +
        `want ${want}`,
    );
  }
}

export class MalformedCertEntryError extends PersoError {
  readonly kind = "MALFORMED_CERT_ENTRY";

  /** `reason` replaces the size message for an entry that fits but is bad. */
  constructor(
    readonly declared: number,
    readonly available: number,
    readonly reason?: string,
  ) {
    super(
      reason === undefined
        ? `certificate entry size ${declared} does not fit object body of ` +
            `${available} bytes`
        : `malformed certificate entry: ${reason}`,
    );
  }
}

export class TooManyCertsError extends PersoError {
  readonly kind = "TOO_MANY_CERTS";

  constructor(readonly max: number) {
    super(`too many certificates in blob: max ${max}`);
  }
}

export class TooManySeedsError extends PersoError {
  readonly kind = "TOO_MANY_SEEDS";

  constructor(readonly max: number) {
    super(`too many seeds in blob: max ${max}`);
  }
}

export class SeedTooLargeError extends PersoError {
  readonly kind = "SEED_TOO_LARGE";

  constructor(
    readonly got: number,
    readonly max: number,
  ) {
    super(`seed size ${got} exceeds max ${max}`);
  }
}

export class BlobFullError extends PersoError {
  readonly kind = "BLOB_FULL";

  constructor(
    readonly used: number,
    readonly needed: number,
    readonly capacity: number,
  ) {
    super(
      `personalization blob is full: used ${used}, needed ${needed}, ` +
        `capacity ${capacity}`,
    );
  }
}

export class InvalidCertError extends PersoError {
  readonly kind = "INVALID_CERT";

  constructor(readonly reason: string) {
    super(`invalid certificate: ${reason}`);
  }
}

/**
 * An output buffer or frame budget ran out. Where the full size is unknown
 * until the output is written, as when frames are received, `need` is a
 * lower bound: one unit more than `have`.
 */
export class OutputTooSmallError extends PersoError {
  readonly kind = "OUTPUT_TOO_SMALL";

  constructor(
    readonly need: number,
    readonly have: number,
  ) {
    super(`output too small: need ${need}, have ${have}`);
  }
}

export class MissingRequiredObjectError extends PersoError {
  readonly kind = "MISSING_REQUIRED_OBJECT";

  constructor(readonly objectKind: "WasTbsHmac" | "X509Tbs") {
    super(`no ${objectKind} object found in the blob`);
  }
}

export class ZeroDeviceIdError extends PersoError {
  readonly kind = "ZERO_DEVICE_ID";

  constructor() {
    super("device id is empty");
  }
}

export class InvalidCommandError extends PersoError {
  readonly kind = "INVALID_COMMAND";

  constructor(
    readonly command: string,
    detail: string,
    cause?: unknown,
  ) {
    super(`invalid ${command} command: ${detail}`, cause);
  }
}

export class InvalidTokenError extends PersoError {
  readonly kind = "INVALID_TOKEN";

  constructor(
    readonly token: string,
    readonly got: number,
    readonly want: number,
  ) {
    super(`invalid ${token}: got ${got} bytes, want ${want}`);
  }
}

export class CrcMismatchError extends PersoError {
  readonly kind = "CRC_MISMATCH";

  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`crc mismatch: envelope carries ${expected}, payload has ${actual}`);
  }
}
