// tests/unit/commands/rma-token.test.ts
import { describe, expect, it } from "vitest";
import assert from "assert";
import {
  rmaTokenFromJson,
  rmaTokenToJson,
} from "../../../src/commands/rma-token.js";
import {
  CrcMismatchError,
  InvalidCommandError,
  InvalidTokenError,
} from "../../../src/common/errors.js";
import { toHex } from "../../../src/common/codecs.js";

const token = new Uint8Array(16);
token[0] = 0x11;
token[1] = 0x22;

const PRIMARY = '{"hash":["8721","0"]}';
const ENCODED = `${PRIMARY}{"crc": 2602364282}`;

describe("rmaTokenToJson", () => {
  it("appends the CRC-32 of the token object", () => {
    assert.strictEqual(rmaTokenToJson(token), ENCODED);
  });

  it("can leave the envelope out", () => {
    assert.strictEqual(rmaTokenToJson(token, { skipCrc: true }), PRIMARY);
  });

  it("requires a 16-byte token", () => {
    expect(() => rmaTokenToJson(new Uint8Array(8))).toThrow(InvalidTokenError);
  });
});

describe("rmaTokenFromJson", () => {
  it("decodes the token and ignores the envelope by default", () => {
    assert.strictEqual(toHex(rmaTokenFromJson(ENCODED)), toHex(token));
    assert.strictEqual(toHex(rmaTokenFromJson(PRIMARY)), toHex(token));
    const tampered = `${PRIMARY}{"crc": 1}`;
    assert.strictEqual(toHex(rmaTokenFromJson(tampered)), toHex(token));
  });

  it("verifies the envelope on request", () => {
    const noisy = `RMA> ${ENCODED}\r\n`;
    const out = rmaTokenFromJson(noisy, { verifyCrc: true });
    assert.strictEqual(toHex(out), toHex(token));
  });

  it("reports both values on a mismatch", () => {
    try {
      rmaTokenFromJson(`${PRIMARY}{"crc": 1}`, { verifyCrc: true });
      assert.fail("expected CrcMismatchError");
    } catch (err) {
      assert.ok(err instanceof CrcMismatchError);
      assert.strictEqual(err.expected, 1);
      assert.strictEqual(err.actual, 2602364282);
    }
  });

  it("requires the envelope when verifying", () => {
    expect(() => rmaTokenFromJson(PRIMARY, { verifyCrc: true })).toThrow(
      "invalid RMA token command: missing crc envelope",
    );
  });

  it("rejects a malformed token", () => {
    expect(() => rmaTokenFromJson('{"hash":["1"]}')).toThrow(
      InvalidCommandError,
    );
  });
});
