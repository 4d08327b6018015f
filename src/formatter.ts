import { parse } from "./normalizer";
import type { CountryRule } from "./registry";

export enum PhoneFormat {
  /** +12025550173 */
  E164 = "E164",
  /** +1 (202) 555-0173 */
  International = "INTERNATIONAL",
  /** (202) 555-0173 */
  National = "NATIONAL",
  /** tel:+1-202-555-017-3 */
  RFC3966 = "RFC3966",
}

function chunk(s: string, size: number): string[] {
  const out: string[] = [];
  for (let i = 0; i < s.length; i += size) out.push(s.slice(i, i + size));
  return out;
}

/**
 * Presentational grouping only. Countries without an entry are split in two
 * at the midpoint.
 */
export function formatNationalNumber(national: string, country: CountryRule): string {
  switch (country.code) {
    case "US":
    case "CA":
      return national.length === 10
        ? `(${national.slice(0, 3)}) ${national.slice(3, 6)}-${national.slice(6)}`
        : national;
    case "GB":
    case "GB-CYM":
      return national.length >= 10
        ? `${national.slice(0, 4)} ${national.slice(4, 7)} ${national.slice(7)}`
        : national;
    case "DE":
      return national.length >= 10 ? `${national.slice(0, 3)} ${national.slice(3)}` : national;
    default: {
      if (national.length < 7) return national;
      const mid = Math.floor(national.length / 2);
      return `${national.slice(0, mid)} ${national.slice(mid)}`;
    }
  }
}

export function formatNumber(raw: string, style: PhoneFormat): string | null {
  const result = parse(raw);
  if (!result.ok) return null;
  const { e164, country, nationalNumber } = result;

  switch (style) {
    case PhoneFormat.E164:
      return e164;
    case PhoneFormat.International:
      return `+${country.prefix} ${formatNationalNumber(nationalNumber, country)}`;
    case PhoneFormat.National:
      return formatNationalNumber(nationalNumber, country);
    case PhoneFormat.RFC3966:
      return `tel:+${country.prefix}-${chunk(nationalNumber, 3).join("-")}`;
  }
}
