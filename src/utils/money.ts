/**
 * Fixed-point money helpers
 * Amounts are carried as integer minor units once normalized
 */

/** Rounds a value already scaled to minor units to an integer */
export type RoundingPolicy = (scaled: number) => number;

/**
 * Round half up to the nearest integer.
 * The scaled value is first trimmed to 9 decimals so that 1850.4999999999998
 * (18.505 * 100 in binary floating point) counts as the half it stands for.
 */
export const roundHalfUp: RoundingPolicy = (scaled) =>
  Math.floor(Number(scaled.toFixed(9)) + 0.5);

export function toMinorUnits(
  amount: number,
  minorDigits: number,
  round: RoundingPolicy = roundHalfUp
): number {
  return round(amount * 10 ** minorDigits);
}

export function formatMinorUnits(amountMinor: number, minorDigits: number): string {
  if (minorDigits === 0) {
    return String(amountMinor);
  }
  const sign = amountMinor < 0 ? '-' : '';
  const digits = String(Math.abs(amountMinor)).padStart(minorDigits + 1, '0');
  const whole = digits.slice(0, digits.length - minorDigits);
  const fraction = digits.slice(digits.length - minorDigits);
  return `${sign}${whole}.${fraction}`;
}
