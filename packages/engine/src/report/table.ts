import type { IterationRecord, IterationSink, RootOutcome, StopReason } from "@scalar-roots/shared";

export type WriteLine = (line: string) => void;

export const TABLE_HEADER = "Iteration |    First    |   Second    |  Estimate   | Error";
export const TABLE_RULE = "-".repeat(68);

function defaultWrite(line: string): void {
  const maybeConsole = (globalThis as { console?: { log?: (msg: string) => void } }).console;
  maybeConsole?.log?.(line);
}

/** Like C's %.<digits>e: mantissa digits fixed, exponent at least two digits. */
export function formatScientific(value: number, digits: number): string {
  if (!Number.isFinite(value)) return String(value);
  return value
    .toExponential(digits)
    .replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`);
}

export function formatIterationRow(r: IterationRecord): string {
  const fixed = (v: number) => v.toFixed(7).padStart(11);
  return [
    String(r.index).padStart(9),
    fixed(r.first),
    fixed(r.second),
    fixed(r.estimate),
    formatScientific(r.error, 4),
  ].join(" | ");
}

/**
 * Sink that renders records as a fixed-width table.
 * The title, header and rule are written lazily, just before the first row.
 */
export function createTableSink(options: { title?: string; write?: WriteLine } = {}): IterationSink {
  const write = options.write ?? defaultWrite;
  let started = false;

  return (record) => {
    if (!started) {
      started = true;
      if (options.title) write(`--- ${options.title} ---`);
      write(TABLE_HEADER);
      write(TABLE_RULE);
    }
    write(formatIterationRow(record));
  };
}

function describeStop(stop: StopReason, iterations: number): string {
  switch (stop) {
    case "tolerance":
      return "Convergence reached.";
    case "exact-root":
      return "Exact root found.";
    case "iteration-limit":
      return `Maximum iterations (${iterations}) reached without meeting the tolerance.`;
    case "resolution-limit":
      return "Bracket reached floating-point resolution before the tolerance.";
    case "stability-guard":
      return "Aitken denominator is numerically zero; acceleration not applicable.";
    case "non-finite":
      return "Stopped on a non-finite iterate.";
    default: {
      const unreachable: never = stop;
      return unreachable;
    }
  }
}

/** Closing lines printed after a run's table. */
export function formatSummary(outcome: RootOutcome): string[] {
  if (!outcome.ok) {
    return [`Error (${outcome.error}): ${outcome.message}`];
  }

  return [
    describeStop(outcome.stop, outcome.iterations),
    `Approximate root: ${outcome.root.toFixed(7)}`,
    `f(root): ${formatScientific(outcome.residual, 6)}`,
    `Iterations: ${outcome.iterations}`,
  ];
}
