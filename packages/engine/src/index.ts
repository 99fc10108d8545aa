export { bisection } from "./roots/bisection";
export type { BisectionOptions } from "./roots/bisection";
export { regulaFalsi } from "./roots/regulaFalsi";
export { secant } from "./roots/secant";
export { illinois } from "./roots/illinois";
export { fixedPoint } from "./roots/fixedPoint";
export type { FixedPointOptions } from "./roots/fixedPoint";
export { steffensen } from "./roots/steffensen";
export { evalPoly } from "./math/poly";
export { ulp, isApproxZero, signsDiffer } from "./math/float";
export { openBracket } from "./math/bracket";
export type { Bracket } from "./math/bracket";
export {
  createTableSink,
  formatIterationRow,
  formatScientific,
  formatSummary,
  TABLE_HEADER,
  TABLE_RULE,
} from "./report/table";
export type { WriteLine } from "./report/table";
