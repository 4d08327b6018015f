import { stripNonDigits } from "./characterFilter";
import { isValid } from "./normalizer";
import { COUNTRIES, CountryRule, findCountryByIso } from "./registry";
import { resolveCountry } from "./resolver";

const COMMON_COUNTRIES = ["US", "GB", "DE", "FR", "IN", "AU", "CA"];
const MAX_SUGGESTIONS = 5;

function withPrefix(country: CountryRule, digits: string): string | null {
  const candidate = `+${country.prefix}${digits}`;
  return isValid(candidate) ? candidate : null;
}

/**
 * Plausible valid spellings of an invalid number: a missing country code,
 * extra leading digits, or one missing leading digit. At most five, sorted.
 */
export function suggestCorrections(raw: string, countryHint?: string): string[] {
  if (isValid(raw)) return [raw];

  const digits = stripNonDigits(raw);
  const hinted = countryHint === undefined ? null : findCountryByIso(countryHint);
  const suggestions = new Set<string>();
  const add = (s: string | null) => {
    if (s) suggestions.add(s);
  };

  if (countryHint !== undefined) {
    if (hinted) add(withPrefix(hinted, digits));
  } else {
    for (const code of COMMON_COUNTRIES) {
      const country = findCountryByIso(code);
      if (country) add(withPrefix(country, digits));
    }
  }

  if (hinted && digits.length > 15) {
    for (let i = 1; i <= digits.length - 7; i++) {
      const shortened = withPrefix(hinted, digits.slice(i));
      if (shortened) {
        suggestions.add(shortened);
        break;
      }
    }
  }

  if (hinted && digits.length < 10) {
    for (let d = 0; d <= 9; d++) add(withPrefix(hinted, `${d}${digits}`));
  }

  return Array.from(suggestions).sort().slice(0, MAX_SUGGESTIONS);
}

/** Digit count is within phone-number range and not all zeros. */
export function isPotentiallyValid(raw: string): boolean {
  const digits = stripNonDigits(raw);
  return digits.length >= 7 && digits.length <= 15 && /[1-9]/.test(digits);
}

/**
 * Best guess at the country of `raw`: an exact prefix match first, then
 * common length patterns.
 */
export function guessCountry(raw: string): CountryRule | null {
  const digits = stripNonDigits(raw);
  if (!digits) return null;

  const exact = resolveCountry(digits, COUNTRIES);
  if (exact) return exact;

  if (digits.length === 10) return findCountryByIso("US");
  if (digits.length === 11 && digits.startsWith("1")) return findCountryByIso("US");
  if (digits.length === 11 && digits.startsWith("44")) return findCountryByIso("GB");
  if (digits.length === 12 && digits.startsWith("49")) return findCountryByIso("DE");
  return null;
}
