import type { ScalarFn, Terms } from "@scalar-roots/shared";
import { evalPoly } from "@scalar-roots/engine";
import { CatalogError } from "./errors";

type TermKey = keyof Terms;

const TERM_KEYS: readonly TermKey[] = ["poly", "cos", "expNeg"];

function isTermKey(key: string): key is TermKey {
  return (TERM_KEYS as readonly string[]).includes(key);
}

function toFinite(raw: string, label: string): number {
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n)) {
    throw new CatalogError(`${label}: "${raw}" is not a finite number`);
  }
  return n;
}

/**
 * Parse `poly=c0 c1 ...;cos=k;expNeg=k`. Any part may be left out.
 * Returns undefined for an empty cell.
 */
export function parseTerms(text: string): Terms | undefined {
  const trimmed = text.trim();
  if (!trimmed) return undefined;

  const terms: Terms = { poly: [], cos: 0, expNeg: 0 };
  const seen = new Set<TermKey>();

  for (const part of trimmed.split(";")) {
    const piece = part.trim();
    if (!piece) continue;

    const eq = piece.indexOf("=");
    if (eq < 0) throw new CatalogError(`term "${piece}" is missing "="`);

    const key = piece.slice(0, eq).trim();
    const value = piece.slice(eq + 1).trim();
    if (!isTermKey(key)) {
      throw new CatalogError(`unknown term "${key}" (expected ${TERM_KEYS.join(", ")})`);
    }
    if (seen.has(key)) throw new CatalogError(`term "${key}" given twice`);
    seen.add(key);

    if (key === "poly") {
      const coeffs = value.split(/\s+/).filter(Boolean);
      if (!coeffs.length) throw new CatalogError("poly needs at least one coefficient");
      terms.poly = coeffs.map((c) => toFinite(c, "poly"));
    } else {
      terms[key] = toFinite(value, key);
    }
  }

  return terms;
}

export function buildFunction(terms: Terms): ScalarFn {
  const { poly, cos, expNeg } = terms;
  return (x) => {
    let y = evalPoly(poly, x);
    // skip zero terms so that e.g. x^3 - x - 1 evaluates exactly as the bare polynomial
    if (cos !== 0) y += cos * Math.cos(x);
    if (expNeg !== 0) y += expNeg * Math.exp(-x);
    return y;
  };
}

export function formatTerms(terms: Terms): string {
  const parts: string[] = [];
  if (terms.poly.length) parts.push(`poly=${terms.poly.join(" ")}`);
  if (terms.cos !== 0) parts.push(`cos=${terms.cos}`);
  if (terms.expNeg !== 0) parts.push(`expNeg=${terms.expNeg}`);
  return parts.join(";");
}
