/**
 * Replace negative zero by positive zero
 * @param value - Any number
 * @returns The same number, with -0 turned into 0
 */
export function normalizeNegativeZero(value: number): number {
  return value === 0 ? 0 : value;
}

/**
 * Round a price to two decimals for display.
 * Values that round to zero from below come out as 0, never -0.
 * @param value - Price
 * @returns Rounded price
 */
export function roundPrice(value: number): number {
  return normalizeNegativeZero(Math.round(value * 100) / 100);
}
