/**
 * Round to a fixed number of decimals, half away from zero.
 *
 * Shifts the decimal point through the number's string form so that values
 * such as 1.005 round on their written digits rather than on their binary
 * approximation.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;

  const sign = value < 0 ? -1 : 1;
  const digits = String(Math.abs(value));
  if (digits.includes('e')) {
    const factor = 10 ** decimals;
    return (sign * Math.round(Math.abs(value) * factor)) / factor;
  }

  const shifted = Math.round(Number(`${digits}e${decimals}`));
  return sign * Number(`${shifted}e-${decimals}`);
}

export function roundMoney(value: number): number {
  return roundTo(value, 2);
}

/**
 * Format a monetary amount with exactly two decimals
 */
export function formatMoney(value: number): string {
  return roundMoney(value).toFixed(2);
}
