import { describe, expect, test } from "vitest";
import { heartbeatDelayMs } from "#/domain/heartbeat/backoff";

describe("heartbeatDelayMs", () => {
  test("is nominal without failures", () => {
    expect(heartbeatDelayMs(30_000, 0)).toBe(30_000);
  });

  test("doubles per failure up to ten times the interval", () => {
    expect(
      [1, 2, 3, 4, 5, 20].map((failures) => heartbeatDelayMs(30_000, failures)),
    ).toEqual([60_000, 120_000, 240_000, 300_000, 300_000, 300_000]);
  });

  test("never decreases as failures grow", () => {
    let previous = 0;
    for (let failures = 0; failures <= 100; failures += 1) {
      const delay = heartbeatDelayMs(5_000, failures);
      expect(delay).toBeGreaterThanOrEqual(previous);
      previous = delay;
    }
  });
});
