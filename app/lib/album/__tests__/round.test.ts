import { describe, expect, it } from "vitest";

import { formatFixed, roundHalfEven } from "../round";

describe("roundHalfEven", () => {
  it("rounds to two decimals", () => {
    expect(roundHalfEven(2 / 3)).toBe(0.67);
    expect(roundHalfEven(50)).toBe(50);
    expect(roundHalfEven(0)).toBe(0);
  });

  it("sends exact ties to the even digit", () => {
    expect(roundHalfEven(1.125)).toBe(1.12);
    expect(roundHalfEven(0.375)).toBe(0.38);
    expect(roundHalfEven(0.125)).toBe(0.12);
    expect(roundHalfEven(2.5, 0)).toBe(2);
    expect(roundHalfEven(3.5, 0)).toBe(4);
  });

  it("decides near-ties on the exact value of the double", () => {
    expect(roundHalfEven(171 / 120)).toBe(1.43);
    expect(roundHalfEven(1 / 40)).toBe(0.03);
    expect(roundHalfEven(-1 / 40)).toBe(-0.03);
    expect(roundHalfEven(1.005)).toBe(1);
  });

  it("passes non-finite values through", () => {
    expect(roundHalfEven(Number.POSITIVE_INFINITY)).toBe(Number.POSITIVE_INFINITY);
    expect(roundHalfEven(Number.NaN)).toBeNaN();
  });
});

describe("formatFixed", () => {
  it("pads to the requested number of places", () => {
    expect(formatFixed(0.1, 10)).toBe("0.1000000000");
    expect(formatFixed(1, 2)).toBe("1.00");
    expect(formatFixed(2.5, 0)).toBe("2");
  });

  it("carries into the integer part", () => {
    expect(formatFixed(9.999, 2)).toBe("10.00");
  });

  it("keeps the sign of negatives and negative zero", () => {
    expect(formatFixed(-0, 2)).toBe("-0.00");
    expect(formatFixed(-0.001, 2)).toBe("-0.00");
    expect(formatFixed(-0.25, 10)).toBe("-0.2500000000");
  });

  it("writes huge values out in full", () => {
    expect(formatFixed(1e21, 2)).toBe("1000000000000000000000.00");
  });
});
