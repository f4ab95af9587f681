import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { parse } from "csv-parse/sync";
import type { PolynomialCase } from "@qmc-roots/shared";

type CsvRow = Record<string, string>;

const csvPath = fileURLToPath(new URL("../data/polynomials.csv", import.meta.url));

let cases: PolynomialCase[] | null = null;

function warn(message: string): void {
  const maybeConsole = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  maybeConsole?.warn?.(message);
}

function toNumbers(field: string | undefined): number[] {
  if (!field) return [];
  return field.split(/\s+/).filter(Boolean).map(Number);
}

export function parsePolynomialRow(row: CsvRow): PolynomialCase | null {
  const id = row.id ?? "";
  const coefficients = toNumbers(row.coefficients);
  const lo = Number(row.lo);
  const hi = Number(row.hi);
  const roots = toNumbers(row.roots).sort((a, b) => a - b);

  const numbers = [...coefficients, lo, hi, ...roots];
  if (!id || coefficients.length === 0 || !numbers.every(Number.isFinite)) {
    return null;
  }

  return { id, coefficients, domain: [lo, hi], roots };
}

export function parsePolynomialCsv(text: string): PolynomialCase[] {
  const rows = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  }) as CsvRow[];

  const out: PolynomialCase[] = [];
  rows.forEach((row, i) => {
    const parsed = parsePolynomialRow(row);
    if (parsed) {
      out.push(parsed);
    } else {
      warn(`[@qmc-roots/catalog] skipping malformed polynomial row ${i + 1} (${row.id ?? "no id"})`);
    }
  });
  return out;
}

export function loadPolynomialCases(): PolynomialCase[] {
  if (!cases) {
    cases = parsePolynomialCsv(fs.readFileSync(csvPath, "utf8"));
  }
  return cases;
}

export function loadPolynomialCase(id: string): PolynomialCase | undefined {
  return loadPolynomialCases().find((c) => c.id === id);
}
