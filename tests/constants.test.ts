import { describe, it, expect } from "vitest";
import {
  getControlConstants,
  isSupportedSubgroupSize,
  supportedSubgroupSizes,
} from "../src/constants/control_constants.js";
import { SpcError } from "../src/shared/errors.js";

describe("Control chart constants", () => {
  it("covers subgroup sizes 2 through 25", () => {
    expect(supportedSubgroupSizes()).toEqual({ min: 2, max: 25 });
    expect(isSupportedSubgroupSize(2)).toBe(true);
    expect(isSupportedSubgroupSize(25)).toBe(true);
    expect(isSupportedSubgroupSize(1)).toBe(false);
    expect(isSupportedSubgroupSize(26)).toBe(false);
    expect(isSupportedSubgroupSize(4.5)).toBe(false);
  });

  it("returns the published factors for n = 5", () => {
    const c = getControlConstants(5);
    expect(c).toMatchObject({ n: 5, A2: 0.577, A3: 1.427, d2: 2.326, D3: 0, D4: 2.114, B3: 0, B4: 2.089, c4: 0.94 });
    expect(c.E2).toBeCloseTo(3 / 2.326, 12);
  });

  it("returns the published factors at both ends of the table", () => {
    expect(getControlConstants(2)).toMatchObject({ A2: 1.88, d2: 1.128, D4: 3.267, B4: 3.267, c4: 0.7979 });
    expect(getControlConstants(25)).toMatchObject({ A2: 0.153, A3: 0.606, d2: 3.931, D3: 0.459, B3: 0.565 });
  });

  it("has B3 = 0.466 for n = 17", () => {
    expect(getControlConstants(17).B3).toBe(0.466);
  });

  it("returns the same frozen row on repeated lookups", () => {
    const first = getControlConstants(8);
    expect(getControlConstants(8)).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it("throws UNSUPPORTED_SUBGROUP_SIZE outside 2..25", () => {
    for (const n of [0, 1, 26, 3.5]) {
      expect(() => getControlConstants(n)).toThrow(SpcError);
      try {
        getControlConstants(n);
      } catch (err) {
        expect(err instanceof SpcError && err.code).toBe("UNSUPPORTED_SUBGROUP_SIZE");
      }
    }
  });

  it("D3 is zero for n ≤ 6 and positive from n = 7", () => {
    for (let n = 2; n <= 6; n++) expect(getControlConstants(n).D3).toBe(0);
    expect(getControlConstants(7).D3).toBe(0.076);
  });
});
