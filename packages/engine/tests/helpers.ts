import type { IterationRecord, RootFailure, RootOutcome, RootResult, ScalarFn } from "@scalar-roots/shared";

export const CUBIC_ROOT = 1.324717957244746; // x^3 - x - 1
export const COS_FIXED_POINT = 0.7390851332151607;

export const cubic: ScalarFn = (x) => x * x * x - x - 1;

// x^10 - 1 by repeated squaring, so results do not depend on Math.pow rounding
export const tenth: ScalarFn = (x) => {
  const x2 = x * x;
  const x4 = x2 * x2;
  return x4 * x4 * x2 - 1;
};

export function counted(f: ScalarFn): { f: ScalarFn; calls: () => number } {
  let n = 0;
  return {
    f: (x) => {
      n++;
      return f(x);
    },
    calls: () => n,
  };
}

export function collector(): { records: IterationRecord[]; onIteration: (r: IterationRecord) => void } {
  const records: IterationRecord[] = [];
  return { records, onIteration: (r) => records.push(r) };
}

export function expectOk(outcome: RootOutcome): RootResult {
  if (!outcome.ok) {
    throw new Error(`expected a result, got ${outcome.error}: ${outcome.message}`);
  }
  return outcome;
}

export function expectFailure(outcome: RootOutcome): RootFailure {
  if (outcome.ok) {
    throw new Error(`expected a failure, got root ${outcome.root}`);
  }
  return outcome;
}

export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}
