import { classify, classifyType, PhoneNumberType } from "./classifyNumber";
import { formatNumber, PhoneFormat } from "./formatter";
import { areEqual, extractCountry, isValid, normalize, parse, ParseFailure } from "./normalizer";
import type { CountryRule } from "./registry";

// Each helper maps one result per input, in input order. A bad entry never
// fails the batch.

export function validateBatch(numbers: readonly string[]): boolean[] {
  return numbers.map((n) => isValid(n));
}

export function normalizeBatch(numbers: readonly string[]): (string | null)[] {
  return numbers.map((n) => normalize(n));
}

export function extractCountriesBatch(numbers: readonly string[]): (CountryRule | null)[] {
  return numbers.map((n) => extractCountry(n));
}

export function classifyTypesBatch(numbers: readonly string[]): (PhoneNumberType | null)[] {
  return numbers.map((n) => classifyType(n));
}

export function formatBatch(numbers: readonly string[], style: PhoneFormat): (string | null)[] {
  return numbers.map((n) => formatNumber(n, style));
}

export interface PhoneNumberAnalysis {
  original: string;
  isValid: boolean;
  normalized: string | null;
  country: CountryRule | null;
  type: PhoneNumberType | null;
  failure: ParseFailure | null;
}

export function analyze(number: string): PhoneNumberAnalysis {
  const result = parse(number);
  if (!result.ok) {
    return { original: number, isValid: false, normalized: null, country: null, type: null, failure: result.reason };
  }
  return {
    original: number,
    isValid: true,
    normalized: result.e164,
    country: result.country,
    type: classify(result.nationalNumber, result.country),
    failure: null,
  };
}

export function analyzeBatch(numbers: readonly string[]): PhoneNumberAnalysis[] {
  return numbers.map((n) => analyze(n));
}

/**
 * Group inputs that denote the same number. Groups appear in order of their
 * first member; an invalid input always sits in a group of its own.
 */
export function groupEquivalent(numbers: readonly string[]): string[][] {
  const groups: string[][] = [];
  for (const number of numbers) {
    const group = groups.find((g) => areEqual(number, g[0]));
    if (group) group.push(number);
    else groups.push([number]);
  }
  return groups;
}
