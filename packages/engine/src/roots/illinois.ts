import type { RootOutcome, ScalarFn, SolverOptions, Stagnation } from "@scalar-roots/shared";
import { openBracket } from "../math/bracket";
import { signsDiffer } from "../math/float";
import { checkFinite, checkMaxIter, checkTolerance, fail } from "./checks";

/**
 * Illinois variant of false position.
 *
 * Same interpolation and |f(c)| < tol stopping rule as `regulaFalsi`. When the same
 * endpoint is kept on two consecutive updates, its cached function value is halved
 * before the next interpolation, so a stuck endpoint cannot hold the chord in place.
 */
export function illinois(
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
  let stagnant: Stagnation = "none";

  for (let i = 1; i <= maxIter; i++) {
    if (fhi - flo === 0) {
      return fail("degenerate-interpolation", `f(a) and f(b) are equal (${fhi}) at iteration ${i}`, i - 1);
    }

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
      // root in [a, c]: a stays put
      hi = c;
      if (stagnant === "left") flo /= 2;
      fhi = fc;
      stagnant = "left";
    } else {
      lo = c;
      if (stagnant === "right") fhi /= 2;
      flo = fc;
      stagnant = "right";
    }
  }

  return { ok: true, root: c, converged: false, iterations: maxIter, residual: fc, stop: "iteration-limit" };
}
