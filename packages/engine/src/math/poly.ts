/**
 * Evaluate c0 + c1*x + c2*x^2 + ... by Horner's rule.
 * Missing (sparse) coefficients count as zero.
 */
export function evalPoly(coeffs: readonly number[], x: number): number {
  let acc = 0;
  for (let i = coeffs.length - 1; i >= 0; i--) {
    acc = acc * x + (coeffs[i] ?? 0);
  }
  return acc;
}
