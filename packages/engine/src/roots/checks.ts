import type { RootFailure, RootFailureKind } from "@scalar-roots/shared";

export function checkTolerance(tol: number): void {
  if (!Number.isFinite(tol) || tol <= 0) {
    throw new RangeError(`tol must be a finite number > 0, got ${tol}`);
  }
}

export function checkMaxIter(maxIter: number): void {
  if (!Number.isInteger(maxIter) || maxIter < 1) {
    throw new RangeError(`maxIter must be a positive integer, got ${maxIter}`);
  }
}

export function checkFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new RangeError(`${name} must be finite, got ${value}`);
  }
}

export function fail(error: RootFailureKind, message: string, iterations: number): RootFailure {
  return { ok: false, error, message, iterations };
}
