import { COUNTRIES, CountryRule, countDigits } from "./registry";

/**
 * Find the first rule whose dialling prefix leads `digits` and whose accepted
 * national lengths contain what is left. `digits` must already be stripped of
 * non-digits and leading zeros.
 *
 * Table order is the tie-breaker for shared prefixes, so this stays a linear
 * scan rather than a lookup keyed by prefix.
 */
export function resolveCountry(digits: string, rules: readonly CountryRule[] = COUNTRIES): CountryRule | null {
  for (const rule of rules) {
    const p = countDigits(rule.prefix);
    if (digits.length < p) continue;
    const lead = digits.slice(0, p);
    if (!/^\d+$/.test(lead) || Number.parseInt(lead, 10) !== rule.prefix) continue;
    if (rule.phoneLengths.includes(digits.length - p)) return rule;
  }
  return null;
}
