/**
 * Percentage change from `previous` to `current`, rounded half-up to two
 * decimals. A zero `previous` is not guarded and yields Infinity or NaN.
 */
export function percentChange(previous: number, current: number): number {
  return Math.round(((current - previous) / previous) * 10000) / 100;
}
