// tests/integration/personalization.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import { PersoSession } from "../../src/session/perso-session.js";
import { parseConfigFromEnv } from "../../src/config.js";
import { decodeUtf8, toHex } from "../../src/common/codecs.js";
import { createLoopbackPair } from "../helpers/loopback-transport.js";
import {
  HmacEndorsementService,
  SimulatedDut,
} from "../helpers/simulated-dut.js";
import { filled, sequence, silentLogger } from "../helpers/utils.js";

const tokens = {
  waferAuthSecret: filled(32, 0x2b),
  testUnlockToken: sequence(16, 0x10),
  testExitToken: sequence(16, 0x20),
};
const caSubjectKeys = {
  diceAuthKeyKeyId: sequence(20, 0x30),
  extAuthKeyKeyId: sequence(20, 0x50),
};
const deviceId = sequence(32, 0x80);

const hex = (bytes: Uint8Array | undefined) =>
  toHex(bytes ?? new Uint8Array(0));

async function run(frameCapacity: number, rmaToken?: Uint8Array) {
  const { ate, dut } = createLoopbackPair();
  const config = parseConfigFromEnv(
    { logLevel: "silent", frameCapacity, maxFramesPerCommand: 64 },
    {},
  );
  const device = new SimulatedDut(dut, {
    deviceId,
    frameCapacity,
    maxFrames: 64,
    expectRmaToken: rmaToken !== undefined,
  });
  const session = new PersoSession(
    ate,
    new HmacEndorsementService(tokens.waferAuthSecret),
    { config, logger: silentLogger() },
  );
  const [result] = await Promise.all([
    session.personalize({ tokens, caSubjectKeys, rmaToken }),
    device.run(),
  ]);
  return { result, device };
}

describe("personalization against a simulated device", () => {
  it("completes in single frames", async () => {
    const { result, device } = await run(2048);

    assert.strictEqual(hex(device.tokens?.waferAuthSecret), "2b".repeat(32));
    assert.strictEqual(
      hex(device.tokens?.testUnlockToken),
      toHex(tokens.testUnlockToken),
    );
    assert.strictEqual(
      hex(device.caSubjectKeys?.extAuthKeyKeyId),
      toHex(caSubjectKeys.extAuthKeyKeyId),
    );

    assert.strictEqual(
      toHex(result.cpDeviceId),
      toHex(deviceId.subarray(0, 16)) + "00".repeat(16),
    );
    assert.strictEqual(hex(result.deviceId), toHex(deviceId));
    assert.deepStrictEqual(
      result.certs.map((c) => [c.keyLabel, decodeUtf8(c.cert)]),
      [
        ["UDS", "signed:tbs:UDS"],
        ["CDI_0", "signed:tbs:CDI_0"],
      ],
    );
    assert.strictEqual(result.seeds.length, 1);
    assert.deepStrictEqual(
      device.endorsedCerts.map((c) => c.keyLabel),
      ["UDS", "CDI_0"],
    );
  });

  it("completes with small frames and an RMA token", async () => {
    const rmaToken = sequence(16, 0xc0);
    const { result, device } = await run(24, rmaToken);

    assert.strictEqual(hex(device.rmaToken), toHex(rmaToken));
    assert.deepStrictEqual(
      result.certs.map((c) => decodeUtf8(c.cert)),
      ["signed:tbs:UDS", "signed:tbs:CDI_0"],
    );
    assert.strictEqual(
      decodeUtf8(device.endorsedCerts[1].cert),
      "signed:tbs:CDI_0",
    );
  });
});
