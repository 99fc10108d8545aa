export type RunOverrides = {
  tol?: number;
  maxIter?: number;
  only?: string[];
};

type Env = Record<string, string | undefined>;

const toNum = (v: string | undefined) => {
  if (v == null || v.trim() === "") return NaN;
  const n = Number(v);
  return Number.isFinite(n) ? n : NaN;
};

const clamp = (n: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, n));

/**
 * Demo overrides from the environment:
 *   ROOTS_TOL       tolerance for every problem, clamped to [1e-15, 1]
 *   ROOTS_MAX_ITER  iteration limit, rounded and clamped to [1, 10000]
 *   ROOTS_ONLY      comma-separated problem ids
 * Unset or unparsable values leave the problem's own columns in effect.
 */
export function readOverrides(env: Env): RunOverrides {
  const out: RunOverrides = {};

  const tol = toNum(env.ROOTS_TOL);
  if (Number.isFinite(tol) && tol > 0) out.tol = clamp(tol, 1e-15, 1);

  const maxIter = toNum(env.ROOTS_MAX_ITER);
  if (Number.isFinite(maxIter)) out.maxIter = clamp(Math.round(maxIter), 1, 10000);

  const only = (env.ROOTS_ONLY ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter(Boolean);
  if (only.length) out.only = only;

  return out;
}
