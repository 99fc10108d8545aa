export type ScalarFn = (x: number) => number;

/**
 * One row of a solver's progress, emitted before the iteration's update is applied.
 *
 * `first`/`second` are the bracket `[a, b]` for the interval methods, the point pair
 * `(x0, x1)` for the secant method, and `(x, g(x))` for the fixed-point family.
 */
export type IterationRecord = {
  index: number; // 1-based
  first: number;
  second: number;
  estimate: number; // new approximation
  error: number; // residual or step metric, per method
};

export type IterationSink = (record: IterationRecord) => void;

export type StopReason =
  | "tolerance"
  | "exact-root"
  | "iteration-limit"
  | "resolution-limit"
  | "stability-guard"
  | "non-finite";

export type RootResult = {
  root: number;
  converged: boolean;
  iterations: number;
  residual: number; // f(root)
  stop: StopReason;
};

export type RootFailureKind =
  | "invalid-bracket"
  | "degenerate-secant"
  | "degenerate-interpolation"
  | "non-finite";

export type RootFailure = {
  ok: false;
  error: RootFailureKind;
  message: string;
  iterations: number; // completed before the failure
};

export type RootOutcome = ({ ok: true } & RootResult) | RootFailure;

export type FixedPointResult = {
  p: number;
  residual: number;
  iterations: number;
  converged: boolean;
  stop: StopReason;
};

// Which bracket endpoint was kept by the previous Illinois update.
export type Stagnation = "none" | "left" | "right";

export type MethodName =
  | "bisection"
  | "regula-falsi"
  | "secant"
  | "illinois"
  | "fixed-point"
  | "steffensen";

/** `evalPoly(poly, x) + cos * Math.cos(x) + expNeg * Math.exp(-x)` */
export type Terms = {
  poly: number[]; // c0 + c1*x + c2*x^2 + ...
  cos: number;
  expNeg: number;
};

export type Problem = {
  id: string;
  method: MethodName;
  description: string;
  f?: Terms;
  g?: Terms;
  a?: number;
  b?: number;
  x0?: number;
  x1?: number;
  tol: number;
  maxIter: number;
};

export type SolverOptions = {
  onIteration?: IterationSink;
};
