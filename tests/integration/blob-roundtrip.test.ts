// tests/integration/blob-roundtrip.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import {
  buildPersoBlob,
  createPersoBlob,
  packPersoBlob,
} from "../../src/builder/blob-packer.js";
import {
  LENIENT_UNPACK_POLICY,
  unpackPersoBlob,
} from "../../src/parser/blob-unpacker.js";
import {
  persoBlobFromFrames,
  persoBlobToFrames,
} from "../../src/commands/json-commands.js";
import { toHex } from "../../src/common/codecs.js";
import { filled, sequence } from "../helpers/utils.js";

const hex = (bytes: Uint8Array | undefined) =>
  toHex(bytes ?? new Uint8Array(0));

describe("perso blob: build, frame, reassemble, unpack", () => {
  it("carries every record kind through the console", () => {
    const contents = {
      deviceId: sequence(32, 0x40),
      signature: filled(32, 0xa5),
      persoFwHash: filled(32, 0x3c),
      tbsCerts: [
        { keyLabel: "UDS", tbs: sequence(300) },
        { keyLabel: "CDI_0", tbs: sequence(120, 7) },
      ],
      certs: [{ keyLabel: "TPM_EK", cert: sequence(64, 9) }],
      seeds: [{ raw: filled(64, 0x12) }],
    };
    const blob = buildPersoBlob(contents);
    const frames = persoBlobToFrames(blob, 128);
    const out = unpackPersoBlob(persoBlobFromFrames(frames));

    assert.strictEqual(hex(out.deviceId), toHex(contents.deviceId));
    assert.strictEqual(hex(out.signature), toHex(contents.signature));
    assert.strictEqual(hex(out.persoFwHash), toHex(contents.persoFwHash));
    assert.deepStrictEqual(
      out.tbsCerts.map((c) => [c.keyLabel, toHex(c.tbs)]),
      contents.tbsCerts.map((c) => [c.keyLabel, toHex(c.tbs)]),
    );
    assert.deepStrictEqual(
      out.certs.map((c) => [c.keyLabel, toHex(c.cert)]),
      [["TPM_EK", toHex(contents.certs[0].cert)]],
    );
    assert.strictEqual(toHex(out.seeds[0].raw), "12".repeat(64));
  });

  it("packs certificates up to the capacity the unpacker allows", () => {
    const certs = Array.from({ length: 10 }, (_, i) => ({
      keyLabel: `CERT_${i}`,
      cert: sequence(200, i),
    }));
    const blob = packPersoBlob(certs, createPersoBlob());
    const out = unpackPersoBlob(blob, { policy: LENIENT_UNPACK_POLICY });
    assert.deepStrictEqual(
      out.certs.map((c) => c.keyLabel),
      certs.map((c) => c.keyLabel),
    );
    assert.strictEqual(blob.nextFree, 10 * (2 + 2 + 6 + 200));
  });
});
