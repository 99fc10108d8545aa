import { createTableSink, formatSummary, TABLE_RULE } from "@scalar-roots/engine";
import { loadProblems, readOverrides, selectProblems, solveProblem } from "../src/index";

const overrides = readOverrides(process.env);
const problems = selectProblems(loadProblems(), overrides.only);
if (!problems.length) throw new Error("No problems selected");

let failures = 0;

for (const problem of problems) {
  const onIteration = createTableSink({ title: `${problem.method}: ${problem.description}` });
  const { outcome } = solveProblem(problem, {
    onIteration,
    tol: overrides.tol,
    maxIter: overrides.maxIter,
  });

  console.log(TABLE_RULE);
  for (const line of formatSummary(outcome)) console.log(line);
  console.log("");

  if (!outcome.ok) failures++;
}

console.log(`Ran ${problems.length} problem(s), ${failures} failed.`);
if (failures) process.exitCode = 1;
