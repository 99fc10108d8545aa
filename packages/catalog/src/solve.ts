import type { IterationSink, Problem, RootOutcome } from "@scalar-roots/shared";
import {
  bisection,
  fixedPoint,
  illinois,
  regulaFalsi,
  secant,
  steffensen,
} from "@scalar-roots/engine";
import { CatalogError } from "./errors";
import { buildFunction } from "./terms";

export type SolveOptions = {
  onIteration?: IterationSink;
  tol?: number;
  maxIter?: number;
};

export type ProblemRun = {
  problem: Problem;
  outcome: RootOutcome;
};

function need<K extends "a" | "b" | "x0" | "x1" | "f" | "g">(
  problem: Problem,
  key: K
): NonNullable<Problem[K]> {
  const value = problem[key];
  if (value === undefined) {
    throw new CatalogError(`${problem.id}.${key} is required for ${problem.method}`);
  }
  return value;
}

/**
 * Run a catalog problem through its method. Fixed-point results are reported in the
 * same shape as the root finders, with `p` as the root.
 */
export function solveProblem(problem: Problem, options: SolveOptions = {}): ProblemRun {
  const tol = options.tol ?? problem.tol;
  const maxIter = options.maxIter ?? problem.maxIter;
  const sink = { onIteration: options.onIteration };

  let outcome: RootOutcome;
  switch (problem.method) {
    case "bisection":
      outcome = bisection(buildFunction(need(problem, "f")), need(problem, "a"), need(problem, "b"), tol, {
        ...sink,
        maxIter,
      });
      break;
    case "regula-falsi":
      outcome = regulaFalsi(buildFunction(need(problem, "f")), need(problem, "a"), need(problem, "b"), tol, maxIter, sink);
      break;
    case "secant":
      outcome = secant(buildFunction(need(problem, "f")), need(problem, "x0"), need(problem, "x1"), tol, maxIter, sink);
      break;
    case "illinois":
      outcome = illinois(buildFunction(need(problem, "f")), need(problem, "a"), need(problem, "b"), tol, maxIter, sink);
      break;
    case "fixed-point": {
      const r = fixedPoint(buildFunction(need(problem, "g")), need(problem, "x0"), tol, maxIter, {
        ...sink,
        residual: problem.f ? buildFunction(problem.f) : undefined,
      });
      outcome = {
        ok: true,
        root: r.p,
        converged: r.converged,
        iterations: r.iterations,
        residual: r.residual,
        stop: r.stop,
      };
      break;
    }
    case "steffensen":
      outcome = {
        ok: true,
        ...steffensen(buildFunction(need(problem, "g")), buildFunction(need(problem, "f")), need(problem, "x0"), tol, maxIter, sink),
      };
      break;
    default: {
      const unreachable: never = problem.method;
      throw new CatalogError(`unsupported method ${String(unreachable)}`);
    }
  }

  return { problem, outcome };
}
