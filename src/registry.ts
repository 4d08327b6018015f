import * as fs from "node:fs";
import { parse } from "csv-parse/sync";
import { config } from "./config";
import logger from "./logger";

type CsvRow = Record<string, string>;

export interface CountryRule {
  readonly name: string;
  readonly code: string;              // ISO 3166-1 alpha-2, or a subdivision code such as GB-CYM
  readonly prefix: number;            // international dialling prefix
  readonly phoneLengths: readonly number[]; // accepted national-number digit counts
}

export class RegistryError extends Error {
  constructor(message: string, readonly row?: number) {
    super(row === undefined ? message : `${message} (row ${row})`);
    this.name = "RegistryError";
  }
}

/** Number of decimal digits in a dialling prefix. Zero counts as one digit. */
export function countDigits(n: number): number {
  if (n === 0) return 1;
  let count = 0;
  for (let v = n; v > 0; v = Math.floor(v / 10)) count++;
  return count;
}

function rowToRule(row: CsvRow, line: number): CountryRule {
  const name = row["Country"] ?? "";
  const code = row["ISO Code"] ?? "";
  const prefixCell = row["Dialling Code"] ?? "";
  const lengthsCell = row["National Lengths"] ?? "";

  if (!code) throw new RegistryError("Missing ISO code", line);
  if (!/^\d{1,3}$/.test(prefixCell)) {
    throw new RegistryError(`Invalid dialling code "${prefixCell}" for ${code}`, line);
  }

  const phoneLengths = lengthsCell
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => {
      if (!/^\d+$/.test(s)) throw new RegistryError(`Invalid national length "${s}" for ${code}`, line);
      return Number.parseInt(s, 10);
    });
  if (!phoneLengths.length) throw new RegistryError(`No national lengths for ${code}`, line);

  return Object.freeze({
    name,
    code,
    prefix: Number.parseInt(prefixCell, 10),
    phoneLengths: Object.freeze(phoneLengths),
  });
}

/**
 * Parse a country table. Row order is preserved: when two rules share a
 * dialling prefix the earlier one wins resolution.
 */
export function loadCountryRules(csv: string | Buffer): readonly CountryRule[] {
  const rows: CsvRow[] = parse(csv, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  // header is line 1
  return Object.freeze(rows.map((row, i) => rowToRule(row, i + 2)));
}

function loadBundledRules(): readonly CountryRule[] {
  if (!fs.existsSync(config.countriesPath)) {
    throw new RegistryError(`Country table not found: ${config.countriesPath}`);
  }
  const rules = loadCountryRules(fs.readFileSync(config.countriesPath));
  logger.debug({ countriesPath: config.countriesPath, ruleCount: rules.length }, "Loaded country table");
  return rules;
}

export const COUNTRIES: readonly CountryRule[] = loadBundledRules();

export function findCountryByIso(code: string, rules: readonly CountryRule[] = COUNTRIES): CountryRule | null {
  const wanted = code.trim().toUpperCase();
  return rules.find((c) => c.code === wanted) ?? null;
}
