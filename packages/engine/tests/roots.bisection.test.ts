import { describe, expect, it } from "vitest";
import { bisection } from "../src/roots/bisection";
import { collector, counted, createRng, cubic, CUBIC_ROOT, expectFailure, expectOk } from "./helpers";

describe("bisection", () => {
  it("converges on x^3 - x - 1 over [1, 2] within tolerance", () => {
    const result = expectOk(bisection(cubic, 1, 2, 1e-6));

    expect(result.converged).toBe(true);
    expect(result.stop).toBe("tolerance");
    expect(result.iterations).toBe(20); // 2^-20 < 1e-6 < 2^-19
    expect(Math.abs(result.root - CUBIC_ROOT)).toBeLessThan(1e-6);
    expect(result.residual).toBe(cubic(result.root));
  });

  it("halves the bracket exactly on every iteration", () => {
    const { records, onIteration } = collector();
    bisection(cubic, 1, 2, 1e-6, { onIteration });

    expect(records).toHaveLength(20);
    records.forEach((r, k) => {
      expect(r.index).toBe(k + 1);
      expect(r.second - r.first).toBe(1 / 2 ** k);
      expect(r.estimate).toBe((r.first + r.second) / 2);
      expect(r.error).toBe(cubic(r.estimate));
    });
    expect(records[0]).toEqual({ index: 1, first: 1, second: 2, estimate: 1.5, error: 0.875 });
  });

  it("evaluates f once per iteration after the two endpoint checks", () => {
    const { f, calls } = counted(cubic);
    const result = expectOk(bisection(f, 1, 2, 1e-6));
    expect(calls()).toBe(2 + result.iterations);
  });

  it("stops on an exact zero at the midpoint", () => {
    const result = expectOk(bisection((x) => x - 1.5, 1, 2, 1e-12));
    expect(result).toEqual({
      ok: true,
      root: 1.5,
      converged: true,
      iterations: 1,
      residual: 0,
      stop: "exact-root",
    });
  });

  it("fails with invalid-bracket after evaluating only the endpoints", () => {
    const { f, calls } = counted((x) => x * x + 1);
    const failure = expectFailure(bisection(f, -1, 1, 1e-9));

    expect(failure.error).toBe("invalid-bracket");
    expect(failure.iterations).toBe(0);
    expect(calls()).toBe(2);
  });

  it("treats a root at an endpoint as an invalid bracket", () => {
    expect(expectFailure(bisection((x) => x - 2, 2, 5, 1e-12)).error).toBe("invalid-bracket");
  });

  it("fails on non-finite function values", () => {
    expect(expectFailure(bisection(() => Number.NaN, -1, 1, 1e-9)).error).toBe("non-finite");
    const midNaN = expectFailure(bisection((x) => (x === 0 ? Number.NaN : x), -1, 1, 1e-9));
    expect(midNaN.error).toBe("non-finite");
    expect(midNaN.iterations).toBe(0);
  });

  it("accepts endpoints in either order", () => {
    const forward = collector();
    const reversed = collector();
    const a = bisection(cubic, 1, 2, 1e-6, { onIteration: forward.onIteration });
    const b = bisection(cubic, 2, 1, 1e-6, { onIteration: reversed.onIteration });

    expect(b).toEqual(a);
    expect(reversed.records).toEqual(forward.records);
  });

  it("returns a without iterating when the bracket is already narrower than tol", () => {
    const result = expectOk(bisection((x) => x - 0.5, 0.4, 0.6, 0.5));
    expect(result.iterations).toBe(0);
    expect(result.root).toBe(0.4);
    expect(result.residual).toBe(0.4 - 0.5);
    expect(result.converged).toBe(true);
  });

  it("reports iteration-limit when the ceiling is reached", () => {
    const result = expectOk(bisection((x) => x - 1 / 3, 0, 1, 1e-12, { maxIter: 5 }));

    expect(result.converged).toBe(false);
    expect(result.stop).toBe("iteration-limit");
    expect(result.iterations).toBe(5);
    expect(result.root).toBe(0.34375);
  });

  it("stops at float resolution when tol is below the spacing at the root", () => {
    const { f, calls } = counted((x) => x * x - 2);
    const result = expectOk(bisection(f, 1, 2, 1e-300));

    // [1, 2] holds doubles 2^-52 apart: 52 halvings leave two adjacent doubles.
    expect(result).toEqual({
      ok: true,
      root: Math.SQRT2,
      converged: false,
      iterations: 52,
      residual: Math.SQRT2 * Math.SQRT2 - 2,
      stop: "resolution-limit",
    });
    expect(calls()).toBe(2 + 52);
  });

  it("has no default ceiling, so wide brackets run to the tolerance", () => {
    const result = expectOk(bisection((x) => x - 1, 0, 1e30, 1e-6));

    expect(result.converged).toBe(true);
    expect(result.stop).toBe("tolerance");
    expect(result.iterations).toBe(120); // 1e30 / 2^120 < 1e-6 < 1e30 / 2^119
    expect(Math.abs(result.root - 1)).toBeLessThan(1e-6);
  });

  it("rejects a non-positive or non-finite tolerance before evaluating f", () => {
    const { f, calls } = counted(cubic);
    expect(() => bisection(f, 1, 2, 0)).toThrow(RangeError);
    expect(() => bisection(f, 1, 2, -1e-6)).toThrow(RangeError);
    expect(() => bisection(f, 1, 2, Number.NaN)).toThrow(RangeError);
    expect(() => bisection(f, 1, 2, 1e-6, { maxIter: 0 })).toThrow(RangeError);
    expect(() => bisection(f, Number.NaN, 2, 1e-6)).toThrow(RangeError);
    expect(calls()).toBe(0);
  });

  it("converges for deterministic random linear roots", () => {
    const rand = createRng(0x77777777);
    for (let i = 0; i < 120; i++) {
      const root = rand() * 20 - 10;
      const slope = rand() > 0.5 ? 1 : -1;
      const f = (x: number) => slope * (x - root);
      const tol = 1e-9;
      const result = expectOk(bisection(f, root - 5, root + 5, tol, { maxIter: 120 }));

      expect(result.converged).toBe(true);
      expect(Math.abs(result.root - root)).toBeLessThanOrEqual(1.1 * tol);
    }
  });

  it("produces identical output on repeated runs", () => {
    const first = collector();
    const second = collector();
    const a = bisection(cubic, 1, 2, 1e-6, { onIteration: first.onIteration });
    const b = bisection(cubic, 1, 2, 1e-6, { onIteration: second.onIteration });

    expect(b).toEqual(a);
    expect(second.records).toEqual(first.records);
  });
});
