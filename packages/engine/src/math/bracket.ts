import type { RootFailure, ScalarFn } from "@scalar-roots/shared";
import { signsDiffer } from "./float";
import { fail } from "../roots/checks";

export type Bracket = { a: number; b: number; fa: number; fb: number };

/**
 * Evaluate both endpoints once and check that they straddle a sign change.
 * These are the only evaluations made when the bracket is rejected.
 */
export function openBracket(
  f: ScalarFn,
  a: number,
  b: number
): { ok: true; bracket: Bracket } | RootFailure {
  const fa = f(a);
  const fb = f(b);

  if (!Number.isFinite(fa) || !Number.isFinite(fb)) {
    return fail("non-finite", `endpoint value is not finite: f(${a}) = ${fa}, f(${b}) = ${fb}`, 0);
  }
  if (!signsDiffer(fa, fb)) {
    return fail(
      "invalid-bracket",
      `f(a) and f(b) must have opposite signs: f(${a}) = ${fa}, f(${b}) = ${fb}`,
      0
    );
  }

  return { ok: true, bracket: { a, b, fa, fb } };
}
