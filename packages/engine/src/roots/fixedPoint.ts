import type { FixedPointResult, IterationSink, ScalarFn } from "@scalar-roots/shared";
import { checkFinite, checkMaxIter, checkTolerance } from "./checks";

export type FixedPointOptions = {
  /** Function whose zero is the fixed point; defaults to `x => g(x) - x`. Reporting only. */
  residual?: ScalarFn;
  onIteration?: IterationSink;
};

/**
 * Iterate x_{k+1} = g(x_k) until |x_{k+1} - x_k| < tol.
 * Running out of iterations is a normal outcome (`converged: false`), not an error.
 */
export function fixedPoint(
  g: ScalarFn,
  x0: number,
  tol: number,
  maxIter: number,
  options: FixedPointOptions = {}
): FixedPointResult {
  checkFinite("x0", x0);
  checkTolerance(tol);
  checkMaxIter(maxIter);

  const residual = options.residual ?? ((x: number) => g(x) - x);

  let xk = x0;
  let k = 0;
  let converged = false;
  let stop: FixedPointResult["stop"] = "iteration-limit";

  while (k < maxIter) {
    k++;
    const xkp1 = g(xk);
    if (!Number.isFinite(xkp1)) {
      stop = "non-finite";
      break;
    }

    options.onIteration?.({
      index: k,
      first: xk,
      second: xkp1,
      estimate: xkp1,
      error: Math.abs(residual(xkp1)),
    });

    if (Math.abs(xkp1 - xk) < tol) {
      xk = xkp1;
      converged = true;
      stop = "tolerance";
      break;
    }

    xk = xkp1;
  }

  return { p: xk, residual: residual(xk), iterations: k, converged, stop };
}
