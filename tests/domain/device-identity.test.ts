import { createHash } from "node:crypto";
import { describe, expect, test } from "vitest";
import {
  accessPointSsid,
  DeviceIdentityError,
  deriveDeviceId,
  FALLBACK_CPU_SERIAL,
  isDeviceId,
} from "#/domain/identity/device-identity";

describe("deriveDeviceId", () => {
  test("hashes cpu serial and normalized mac into DIG + 11 hex", () => {
    const expected = `DIG${createHash("md5")
      .update("00000000a1b2c3d4-b827eb000001")
      .digest("hex")
      .slice(0, 11)
      .toUpperCase()}`;

    const deviceId = deriveDeviceId({
      cpuSerial: "00000000a1b2c3d4",
      macAddress: "B8:27:EB:00:00:01",
    });

    expect(deviceId).toBe(expected);
    expect(isDeviceId(deviceId)).toBe(true);
  });

  test("is stable across mac spellings", () => {
    const a = deriveDeviceId({ cpuSerial: "abc", macAddress: "b8:27:eb:00:00:01" });
    const b = deriveDeviceId({ cpuSerial: "abc", macAddress: "B8-27-EB-00-00-01" });
    expect(a).toBe(b);
  });

  test("uses the fallback serial when none is readable", () => {
    const blank = deriveDeviceId({ cpuSerial: "  ", macAddress: "b827eb000001" });
    const fallback = deriveDeviceId({
      cpuSerial: FALLBACK_CPU_SERIAL,
      macAddress: "b827eb000001",
    });
    expect(blank).toBe(fallback);
  });

  test("differs between units", () => {
    const a = deriveDeviceId({ cpuSerial: "abc", macAddress: "b827eb000001" });
    const b = deriveDeviceId({ cpuSerial: "abc", macAddress: "b827eb000002" });
    expect(a).not.toBe(b);
  });

  test("rejects a fingerprint without mac", () => {
    expect(() => deriveDeviceId({ cpuSerial: "abc", macAddress: "" })).toThrow(
      DeviceIdentityError,
    );
  });
});

describe("accessPointSsid", () => {
  test("suffixes the last six id characters", () => {
    expect(accessPointSsid("DIG0123456789A")).toBe("PLAYER-SETUP-56789A");
  });
});

describe("isDeviceId", () => {
  test("rejects lower-case and wrong lengths", () => {
    expect(isDeviceId("DIG0123456789a")).toBe(false);
    expect(isDeviceId("DIG0123456789")).toBe(false);
    expect(isDeviceId("XYZ0123456789A")).toBe(false);
  });
});
