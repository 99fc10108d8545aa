import type { IterationSink, RootOutcome, ScalarFn } from "@scalar-roots/shared";
import { openBracket } from "../math/bracket";
import { signsDiffer } from "../math/float";
import { checkFinite, checkMaxIter, checkTolerance, fail } from "./checks";

export type BisectionOptions = {
  /** Optional iteration ceiling. Without one, width and float resolution end the loop. */
  maxIter?: number;
  onIteration?: IterationSink;
};

/**
 * Halve [a, b] until its width is at most `tol` (an interval-width tolerance).
 * Requires f(a) and f(b) of opposite signs; f(a) is cached and only refreshed when `a` moves.
 * A bracket of two adjacent doubles cannot be halved, so a `tol` below the float spacing
 * ends with `stop: "resolution-limit"`.
 */
export function bisection(
  f: ScalarFn,
  a: number,
  b: number,
  tol: number,
  options: BisectionOptions = {}
): RootOutcome {
  const { maxIter } = options;
  checkFinite("a", a);
  checkFinite("b", b);
  checkTolerance(tol);
  if (maxIter !== undefined) checkMaxIter(maxIter);

  const opened = openBracket(f, a, b);
  if (!opened.ok) return opened;

  let { a: lo, b: hi, fa: flo } = opened.bracket;
  if (lo > hi) {
    [lo, hi] = [hi, lo];
    flo = opened.bracket.fb;
  }

  let c = lo;
  let fc = flo;
  let i = 0;

  while (hi - lo > tol) {
    if (i === maxIter) {
      return { ok: true, root: c, converged: false, iterations: i, residual: fc, stop: "iteration-limit" };
    }

    const mid = (lo + hi) / 2;
    if (mid <= lo || mid >= hi) {
      return { ok: true, root: c, converged: false, iterations: i, residual: fc, stop: "resolution-limit" };
    }

    i++;
    c = mid;
    fc = f(c);
    if (!Number.isFinite(fc)) {
      return fail("non-finite", `f(${c}) = ${fc} at iteration ${i}`, i - 1);
    }

    options.onIteration?.({ index: i, first: lo, second: hi, estimate: c, error: fc });

    if (fc === 0) {
      return { ok: true, root: c, converged: true, iterations: i, residual: fc, stop: "exact-root" };
    }

    if (signsDiffer(flo, fc)) {
      hi = c;
    } else {
      lo = c;
      flo = fc;
    }
  }

  return { ok: true, root: c, converged: true, iterations: i, residual: fc, stop: "tolerance" };
}
