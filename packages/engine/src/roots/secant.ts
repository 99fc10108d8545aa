import type { RootOutcome, ScalarFn, SolverOptions } from "@scalar-roots/shared";
import { checkFinite, checkMaxIter, checkTolerance, fail } from "./checks";

/**
 * Secant iteration from two starting points, with no bracketing requirement.
 * Stops on the step size |c - x1| < tol. One evaluation of f per iteration.
 */
export function secant(
  f: ScalarFn,
  x0: number,
  x1: number,
  tol: number,
  maxIter: number,
  options: SolverOptions = {}
): RootOutcome {
  checkFinite("x0", x0);
  checkFinite("x1", x1);
  checkTolerance(tol);
  checkMaxIter(maxIter);

  let fx0 = f(x0);
  let fx1 = f(x1);
  if (!Number.isFinite(fx0) || !Number.isFinite(fx1)) {
    return fail("non-finite", `starting value is not finite: f(${x0}) = ${fx0}, f(${x1}) = ${fx1}`, 0);
  }

  let c = x1;
  let fc = fx1;

  for (let i = 1; i <= maxIter; i++) {
    if (fx1 - fx0 === 0) {
      return fail("degenerate-secant", `f(x0) and f(x1) are equal (${fx1}) at iteration ${i}`, i - 1);
    }

    c = x1 - (fx1 * (x1 - x0)) / (fx1 - fx0);
    fc = f(c);
    if (!Number.isFinite(fc)) {
      return fail("non-finite", `f(${c}) = ${fc} at iteration ${i}`, i - 1);
    }

    options.onIteration?.({ index: i, first: x0, second: x1, estimate: c, error: fc });

    if (Math.abs(c - x1) < tol) {
      return { ok: true, root: c, converged: true, iterations: i, residual: fc, stop: "tolerance" };
    }

    x0 = x1;
    fx0 = fx1;
    x1 = c;
    fx1 = fc;
  }

  return { ok: true, root: c, converged: false, iterations: maxIter, residual: fc, stop: "iteration-limit" };
}
