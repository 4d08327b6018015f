import { containsInvalidCharacter, stripLeadingZeros, stripNonDigits } from "./characterFilter";
import { COUNTRIES, CountryRule, countDigits } from "./registry";
import { resolveCountry } from "./resolver";

export enum ParseFailure {
  EMPTY = "EMPTY",
  INVALID_CHARACTER = "INVALID_CHARACTER",
  UNKNOWN_COUNTRY = "UNKNOWN_COUNTRY",
  INVALID_LENGTH = "INVALID_LENGTH",
}

export type ParseResult =
  | { ok: true; e164: string; country: CountryRule; nationalNumber: string }
  | { ok: false; reason: ParseFailure };

/**
 * Steps shared by the copying and in-place normalizers once the input has
 * passed the character gate and been reduced to digits.
 */
function fromDigits(digits: string, rules: readonly CountryRule[]): ParseResult {
  const cleaned = stripLeadingZeros(digits);
  if (!cleaned) return { ok: false, reason: ParseFailure.EMPTY };

  const country = resolveCountry(cleaned, rules);
  if (!country) return { ok: false, reason: ParseFailure.UNKNOWN_COUNTRY };

  // trunk zeros usually sit after the country code, e.g. +44 (0)20 ...
  const nationalNumber = stripLeadingZeros(cleaned.slice(countDigits(country.prefix)));
  if (!country.phoneLengths.includes(nationalNumber.length)) {
    return { ok: false, reason: ParseFailure.INVALID_LENGTH };
  }

  return { ok: true, e164: `+${country.prefix}${nationalNumber}`, country, nationalNumber };
}

/** Normalize with the reason for failure kept. */
export function parse(raw: string, rules: readonly CountryRule[] = COUNTRIES): ParseResult {
  if (containsInvalidCharacter(raw)) return { ok: false, reason: ParseFailure.INVALID_CHARACTER };
  return fromDigits(stripNonDigits(raw), rules);
}

/** E.164-style canonical form of `raw`, or null when it is not a known number. */
export function normalize(raw: string): string | null {
  const result = parse(raw);
  return result.ok ? result.e164 : null;
}

function isAsciiDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

/**
 * Same result as `normalize(buffer.toString("utf8"))`, but the digits are
 * compacted into the front of `buffer` instead of a fresh string. The
 * buffer's contents are clobbered.
 */
export function normalizeInPlace(buffer: Buffer): string | null {
  let depth = 0;
  let write = 0;
  for (let read = 0; read < buffer.length; read++) {
    const b = buffer[read];
    if (isAsciiDigit(b)) {
      buffer[write++] = b;
      continue;
    }
    switch (b) {
      case 0x20: // space
      case 0x2d: // -
        break;
      case 0x2b: // +
        if (read !== 0) return null;
        break;
      case 0x28: // (
        depth++;
        break;
      case 0x29: // )
        if (depth === 0) return null;
        depth--;
        break;
      default:
        return null;
    }
  }
  if (depth !== 0) return null;

  const result = fromDigits(buffer.toString("latin1", 0, write), COUNTRIES);
  return result.ok ? result.e164 : null;
}

export function isValid(raw: string): boolean {
  if (containsInvalidCharacter(raw)) return false;
  return normalize(raw) !== null;
}

/** Two inputs are equal when both normalize to the same string. */
export function areEqual(a: string, b: string): boolean {
  const left = normalize(a);
  if (left === null) return false;
  return left === normalize(b);
}

export function extractCountry(raw: string): CountryRule | null {
  const result = parse(raw);
  return result.ok ? result.country : null;
}
