// Enough places to hold the exact expansion of any double that can sit on a
// tie at ten places or fewer.
const EXACT_DIGITS = 100;

/**
 * Fixed-point string of `value` rounded on its exact decimal expansion,
 * ties to even. Negative values and -0 keep their sign.
 *
 * @example
 * formatFixed(1 / 2048, 10) // "0.0004882812"
 * formatFixed(171 / 120, 2) // "1.43" (the double sits just above 1.425)
 */
export function formatFixed(value: number, digits: number): string {
  if (!Number.isFinite(value)) return String(value);

  const sign = value < 0 || Object.is(value, -0) ? "-" : "";
  const magnitude = Math.abs(value);

  if (magnitude >= 1e21) {
    const whole = BigInt(magnitude).toString();
    return digits > 0 ? `${sign}${whole}.${"0".repeat(digits)}` : `${sign}${whole}`;
  }

  const [intPart, fraction = ""] = magnitude.toFixed(EXACT_DIGITS).split(".");
  const rest = fraction.slice(digits);
  let kept = BigInt(intPart + fraction.slice(0, digits));

  const first = rest.charAt(0);
  const roundUp =
    first > "5" ||
    (first === "5" && (/[1-9]/.test(rest.slice(1)) || kept % 2n === 1n));
  if (roundUp) kept += 1n;

  const padded = kept.toString().padStart(digits + 1, "0");
  const whole = padded.slice(0, padded.length - digits);
  return digits > 0
    ? `${sign}${whole}.${padded.slice(padded.length - digits)}`
    : `${sign}${whole}`;
}

/**
 * Round to `digits` decimal places, ties to even, deciding ties on the
 * exact value of the double: 1.125 → 1.12, but 1/40 (just above 0.025) → 0.03.
 */
export function roundHalfEven(value: number, digits = 2): number {
  if (!Number.isFinite(value)) return value;
  return Number(formatFixed(value, digits));
}
