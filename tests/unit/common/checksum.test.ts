// tests/unit/common/checksum.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import { crc32 } from "../../../src/common/checksum.js";
import { encodeUtf8 } from "../../../src/common/codecs.js";

describe("crc32", () => {
  it("matches the standard check value", () => {
    assert.strictEqual(crc32(encodeUtf8("123456789")), 0xcbf43926);
  });

  it("is zero for no input", () => {
    assert.strictEqual(crc32(new Uint8Array(0)), 0);
  });

  it("always returns an unsigned value", () => {
    // 0xcbf43926 has the top bit set; the raw library value is negative.
    const value = crc32(encodeUtf8("123456789"));
    assert.ok(value > 0x7fffffff);
    assert.strictEqual(value, 3421780262);
  });
});
