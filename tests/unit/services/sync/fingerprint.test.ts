import { describe, it, expect } from "vitest";

import {
  computeFingerprint,
  stableStringify,
} from "../../../../src/services/sync/fingerprint.js";
import { disasterEvent } from "../../../fixtures/feeds.js";

describe("services/sync/fingerprint", () => {
  describe("stableStringify", () => {
    it("should sort object keys recursively", () => {
      expect(stableStringify({ b: 1, a: { d: 2, c: [3, { f: 1, e: 2 }] } })).toBe(
        '{"a":{"c":[3,{"e":2,"f":1}],"d":2},"b":1}'
      );
    });

    it("should serialize dates as ISO strings and drop undefined", () => {
      expect(
        stableStringify({ a: undefined, b: new Date("2024-01-01T00:00:00Z") })
      ).toBe('{"b":"2024-01-01T00:00:00.000Z"}');
    });
  });

  describe("computeFingerprint", () => {
    it("should produce a sha256 hex digest", () => {
      expect(computeFingerprint(disasterEvent())).toMatch(/^[0-9a-f]{64}$/);
    });

    it("should ignore attribute order", () => {
      const a = disasterEvent({ rawAttributes: { name: "Quake", country: "Testland" } });
      const b = disasterEvent({ rawAttributes: { country: "Testland", name: "Quake" } });

      expect(computeFingerprint(a)).toBe(computeFingerprint(b));
    });

    it("should ignore fetchedAt", () => {
      const a = disasterEvent({ fetchedAt: new Date("2024-05-01T00:00:00Z") });
      const b = disasterEvent({ fetchedAt: new Date("2024-05-02T00:00:00Z") });

      expect(computeFingerprint(a)).toBe(computeFingerprint(b));
    });

    it("should change when a modeled field changes", () => {
      const base = computeFingerprint(disasterEvent());

      expect(computeFingerprint(disasterEvent({ severity: "red" }))).not.toBe(base);
      expect(
        computeFingerprint(
          disasterEvent({ geometry: { type: "Point", coordinates: [12.5, 42] } })
        )
      ).not.toBe(base);
      expect(
        computeFingerprint(disasterEvent({ rawAttributes: { name: "Quake" } }))
      ).not.toBe(base);
    });
  });
});
