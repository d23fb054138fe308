// tests/unit/framing/frame-reassembler.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import { FrameChunker } from "../../../src/framing/frame-chunker.js";
import {
  FrameReassembler,
  trimJsonString,
} from "../../../src/framing/frame-reassembler.js";
import { decodeUtf8, encodeUtf8, toHex } from "../../../src/common/codecs.js";
import { sequence } from "../../helpers/utils.js";

describe("FrameReassembler.reassemble", () => {
  it("restores commands of every length around the frame boundary", () => {
    for (const length of [0, 1, 3, 4, 5, 8, 9]) {
      const command = sequence(length, 0x30);
      const frames = FrameChunker.chunk(command, 4);
      const out = FrameReassembler.reassemble(frames);
      assert.strictEqual(toHex(out), toHex(command));
    }
  });

  it("reads only the used part of each payload", () => {
    const frames = [
      { payload: encodeUtf8('{"a"    '), size: 4 },
      { payload: encodeUtf8(":1}xxxx"), size: 3 },
    ];
    assert.strictEqual(FrameReassembler.reassembleText(frames), '{"a":1}');
  });

  it("rejects a size larger than the payload", () => {
    assert.throws(
      () =>
        FrameReassembler.reassemble([{ payload: new Uint8Array(2), size: 3 }]),
      RangeError,
    );
  });
});

describe("trimToJson", () => {
  it("cuts noise around an object", () => {
    const text = 'garbage{"a":1}trailing';
    const out = FrameReassembler.trimToJson(encodeUtf8(text));
    assert.strictEqual(decodeUtf8(out), '{"a":1}');
  });

  it("returns the input itself when there is nothing to trim to", () => {
    const none = encodeUtf8("no json here");
    assert.strictEqual(FrameReassembler.trimToJson(none), none);
    const reversed = encodeUtf8("} then {");
    assert.strictEqual(FrameReassembler.trimToJson(reversed), reversed);
  });

  it("spans from the first opener of either kind to the last closer", () => {
    const text = '> [{"a":1},{"b":2}] ok';
    const out = FrameReassembler.trimToJson(encodeUtf8(text));
    assert.strictEqual(decodeUtf8(out), '[{"a":1},{"b":2}]');
  });
});

describe("trimJsonString", () => {
  it("matches the byte version", () => {
    assert.strictEqual(trimJsonString('garbage{"a":1}trailing'), '{"a":1}');
    assert.strictEqual(trimJsonString("log: [1,2] done"), "[1,2]");
    assert.strictEqual(trimJsonString('x{"a":[1]}y'), '{"a":[1]}');
  });

  it("leaves text without a usable pair unchanged", () => {
    assert.strictEqual(trimJsonString("no json"), "no json");
    assert.strictEqual(trimJsonString("} x {"), "} x {");
    assert.strictEqual(trimJsonString("{ open only"), "{ open only");
  });
});
