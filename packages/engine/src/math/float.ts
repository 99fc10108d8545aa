const view = new DataView(new ArrayBuffer(8));

/**
 * Gap between |x| and the next larger double, i.e. the unit in the last place at x.
 * ulp(1) === Number.EPSILON, ulp(0) === Number.MIN_VALUE. NaN for non-finite input.
 */
export function ulp(x: number): number {
  const ax = Math.abs(x);
  if (!Number.isFinite(ax)) return Number.NaN;
  if (ax === Number.MAX_VALUE) return 2 ** 971;

  view.setFloat64(0, ax);
  view.setBigUint64(0, view.getBigUint64(0) + 1n);
  return view.getFloat64(0) - ax;
}

/** Absolute-only closeness to zero; no relative tolerance since 0 has no scale. */
export function isApproxZero(value: number, atol: number): boolean {
  return Math.abs(value) <= atol;
}

/** True when a and b are non-zero with opposite signs (a * b < 0 without underflow). */
export function signsDiffer(a: number, b: number): boolean {
  return (a < 0 && b > 0) || (a > 0 && b < 0);
}
