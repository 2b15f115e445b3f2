import { describe, expect, it } from "vitest";

import { createRng, rngChance, rngNextFloat, rngPick, rngRange, rngShuffle } from "../rng";

describe("rng", () => {
  it("is reproducible for a seed", () => {
    const a = createRng(123);
    const b = createRng(123);
    const seqA = Array.from({ length: 5 }, () => rngNextFloat(a));
    const seqB = Array.from({ length: 5 }, () => rngNextFloat(b));
    expect(seqA).toEqual(seqB);
    expect(seqA).toEqual([
      0.7872516233474016,
      0.1785435655619949,
      0.49531551403924823,
      0.23136196262203157,
      0.375791602069512,
    ]);
  });

  it("rngRange and rngChance consume one draw each", () => {
    expect(rngRange(createRng(123), 10, 20)).toBe(17.872516233474016);
    expect(rngChance(createRng(123), 0.78)).toBe(false);
    expect(rngChance(createRng(123), 0.79)).toBe(true);
  });

  it("rngPick stays in range and rejects empty options", () => {
    expect(rngPick(createRng(123), ["a", "b", "c", "d"])).toBe("d");
    expect(() => rngPick(createRng(123), [])).toThrow("rngPick: no options");
  });

  it("rngShuffle permutes in place", () => {
    const arr = [0, 1, 2, 3, 4];
    const out = rngShuffle(createRng(42), arr);
    expect(out).toBe(arr);
    expect(out).toEqual([0, 4, 2, 1, 3]);
  });
});
