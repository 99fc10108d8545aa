import type { RootResult, ScalarFn, SolverOptions } from "@scalar-roots/shared";
import { isApproxZero, ulp } from "../math/float";
import { checkFinite, checkMaxIter, checkTolerance } from "./checks";

// Aitken denominator is treated as zero within this many ulps of the current iterate.
const GUARD_ULPS = 10;

/**
 * Steffensen's method: Aitken's delta-squared applied to each pair of g steps.
 *
 * Each iteration evaluates g twice, x1 = g(x) and x2 = g(x1), and jumps to
 * x - (x1 - x)^2 / (x2 - 2*x1 + x). `f` is only evaluated for the reported error and
 * the final residual. When the second difference vanishes numerically the method stops
 * softly with the last stable x (`stop: "stability-guard"`).
 */
export function steffensen(
  g: ScalarFn,
  f: ScalarFn,
  x0: number,
  tol: number,
  maxIter: number,
  options: SolverOptions = {}
): RootResult {
  checkFinite("x0", x0);
  checkTolerance(tol);
  checkMaxIter(maxIter);

  let x = x0;

  for (let k = 1; k <= maxIter; k++) {
    const x1 = g(x);
    const x2 = g(x1);
    const denom = x2 - 2 * x1 + x;

    if (isApproxZero(denom, GUARD_ULPS * ulp(x))) {
      return { root: x, converged: false, iterations: k - 1, residual: f(x), stop: "stability-guard" };
    }

    const xnew = x - (x1 - x) ** 2 / denom;
    if (!Number.isFinite(xnew)) {
      return { root: x, converged: false, iterations: k - 1, residual: f(x), stop: "non-finite" };
    }

    const err = f(xnew);
    options.onIteration?.({ index: k, first: x, second: x1, estimate: xnew, error: err });

    if (Math.abs(xnew - x) < tol) {
      return { root: xnew, converged: true, iterations: k, residual: err, stop: "tolerance" };
    }

    x = xnew;
  }

  return { root: x, converged: false, iterations: maxIter, residual: f(x), stop: "iteration-limit" };
}
