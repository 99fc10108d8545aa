import type { RootOutcome, ScalarFn, SolverOptions } from "@scalar-roots/shared";
import { openBracket } from "../math/bracket";
import { signsDiffer } from "../math/float";
import { checkFinite, checkMaxIter, checkTolerance, fail } from "./checks";

/**
 * False position: replace one endpoint of [a, b] by the chord's zero crossing.
 * Stops on the function value, |f(c)| < tol, not on the bracket width.
 */
export function regulaFalsi(
  f: ScalarFn,
  a: number,
  b: number,
  tol: number,
  maxIter: number,
  options: SolverOptions = {}
): RootOutcome {
  checkFinite("a", a);
  checkFinite("b", b);
  checkTolerance(tol);
  checkMaxIter(maxIter);

  const opened = openBracket(f, a, b);
  if (!opened.ok) return opened;
  let { a: lo, b: hi, fa: flo, fb: fhi } = opened.bracket;

  let c = lo;
  let fc = flo;

  for (let i = 1; i <= maxIter; i++) {
    c = (lo * fhi - hi * flo) / (fhi - flo);
    fc = f(c);
    if (!Number.isFinite(fc)) {
      return fail("non-finite", `f(${c}) = ${fc} at iteration ${i}`, i - 1);
    }

    options.onIteration?.({ index: i, first: lo, second: hi, estimate: c, error: fc });

    if (Math.abs(fc) < tol) {
      return { ok: true, root: c, converged: true, iterations: i, residual: fc, stop: "tolerance" };
    }

    if (signsDiffer(flo, fc)) {
      hi = c;
      fhi = fc;
    } else {
      lo = c;
      flo = fc;
    }
  }

  return { ok: true, root: c, converged: false, iterations: maxIter, residual: fc, stop: "iteration-limit" };
}
