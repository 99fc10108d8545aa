import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { parse } from "csv-parse/sync";
import type { MethodName, Problem, Terms } from "@scalar-roots/shared";
import { CatalogError } from "./errors";
import { parseTerms } from "./terms";

export { CatalogError } from "./errors";
export { buildFunction, formatTerms, parseTerms } from "./terms";
export { readOverrides } from "./config";
export type { RunOverrides } from "./config";
export { solveProblem } from "./solve";
export type { ProblemRun, SolveOptions } from "./solve";

type CsvRow = Record<string, string>;

const problemsPath = fileURLToPath(new URL("../data/problems.csv", import.meta.url));

const METHODS: readonly MethodName[] = [
  "bisection",
  "regula-falsi",
  "secant",
  "illinois",
  "fixed-point",
  "steffensen",
];

// Columns a row must fill for its method; the rest may stay empty.
const REQUIRED: Record<MethodName, readonly (keyof Problem)[]> = {
  bisection: ["f", "a", "b"],
  "regula-falsi": ["f", "a", "b"],
  secant: ["f", "x0", "x1"],
  illinois: ["f", "a", "b"],
  "fixed-point": ["g", "x0"],
  steffensen: ["g", "f", "x0"],
};

let bundled: Problem[] | null = null;

function warn(message: string): void {
  const maybeConsole = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  maybeConsole?.warn?.(message);
}

function isMethod(value: string): value is MethodName {
  return (METHODS as readonly string[]).includes(value);
}

function optionalNum(row: CsvRow, id: string, column: string): number | undefined {
  const raw = (row[column] ?? "").trim();
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new CatalogError(`${id}.${column}: "${raw}" is not a finite number`);
  return n;
}

function requiredNum(row: CsvRow, id: string, column: string): number {
  const n = optionalNum(row, id, column);
  if (n === undefined) throw new CatalogError(`${id}.${column} is required`);
  return n;
}

function termsColumn(row: CsvRow, id: string, column: "f" | "g"): Terms | undefined {
  try {
    return parseTerms(row[column] ?? "");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`${id}.${column}: ${reason}`, { cause: err });
  }
}

function toProblem(row: CsvRow, line: number): Problem {
  const id = (row.id ?? "").trim();
  if (!id) throw new CatalogError(`row ${line}: id is required`);

  const method = (row.method ?? "").trim();
  if (!isMethod(method)) {
    throw new CatalogError(`${id}.method: "${method}" is not one of ${METHODS.join(", ")}`);
  }

  const maxIter = requiredNum(row, id, "maxIter");
  if (!Number.isInteger(maxIter) || maxIter < 1) {
    throw new CatalogError(`${id}.maxIter must be a positive integer`);
  }
  const tol = requiredNum(row, id, "tol");
  if (tol <= 0) throw new CatalogError(`${id}.tol must be > 0`);

  const problem: Problem = {
    id,
    method,
    description: (row.description ?? "").trim(),
    f: termsColumn(row, id, "f"),
    g: termsColumn(row, id, "g"),
    a: optionalNum(row, id, "a"),
    b: optionalNum(row, id, "b"),
    x0: optionalNum(row, id, "x0"),
    x1: optionalNum(row, id, "x1"),
    tol,
    maxIter,
  };

  for (const column of REQUIRED[method]) {
    if (problem[column] === undefined) {
      throw new CatalogError(`${id}.${column} is required for ${method}`);
    }
  }

  return problem;
}

/** Parse a problem catalog; without text, the bundled data/problems.csv. */
export function loadProblems(csvText?: string): Problem[] {
  if (csvText === undefined && bundled) return bundled;

  const text = csvText ?? fs.readFileSync(problemsPath, "utf8");
  const rows = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  }) as CsvRow[];

  const problems = rows.map((row, i) => toProblem(row, i + 2));

  const ids = new Set<string>();
  for (const p of problems) {
    if (ids.has(p.id)) throw new CatalogError(`duplicate problem id "${p.id}"`);
    ids.add(p.id);
  }

  if (csvText === undefined) bundled = problems;
  return problems;
}

export function loadProblem(id: string): Problem | undefined {
  return loadProblems().find((p) => p.id === id);
}

/** Keep only the listed ids, in catalog order; unknown ids are reported, not fatal. */
export function selectProblems(problems: Problem[], only?: readonly string[]): Problem[] {
  if (!only) return problems;

  const known = new Set(problems.map((p) => p.id));
  for (const id of only) {
    if (!known.has(id)) warn(`[@scalar-roots/catalog] unknown problem id "${id}" ignored`);
  }
  return problems.filter((p) => only.includes(p.id));
}
