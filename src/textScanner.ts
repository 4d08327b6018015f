import { stripLeadingZeros, stripNonDigits } from "./characterFilter";
import { normalize } from "./normalizer";
import { findCountryByIso } from "./registry";

/** A phone-number-shaped span found in free text. */
export interface ExtractedPhoneNumber {
  /** The span as it appeared in the text. */
  readonly raw: string;
  /** E.164 form, when the span normalizes. */
  readonly normalized: string | null;
  /** UTF-8 byte offset of the first character of the span. */
  readonly start: number;
  /** UTF-8 byte offset just past the last digit of the span. */
  readonly end: number;
  readonly isValid: boolean;
}

export const MIN_CANDIDATE_DIGITS = 7;
export const MAX_CANDIDATE_DIGITS = 15;

const ALPHANUMERIC = /^[\p{Alphabetic}\p{N}]$/u;

function isDigit(c: string | undefined): boolean {
  return c !== undefined && c.length === 1 && c >= "0" && c <= "9";
}

/** Byte offset of each code point, plus the total byte length as a final entry. */
export function byteOffsets(chars: readonly string[]): number[] {
  const offsets = new Array<number>(chars.length + 1);
  let bytes = 0;
  for (let i = 0; i < chars.length; i++) {
    offsets[i] = bytes;
    bytes += Buffer.byteLength(chars[i], "utf8");
  }
  offsets[chars.length] = bytes;
  return offsets;
}

export function byteIndexFromCharIndex(text: string, charIndex: number): number {
  return Buffer.byteLength(Array.from(text).slice(0, charIndex).join(""), "utf8");
}

export function charIndexFromByteIndex(text: string, byteIndex: number): number {
  return Array.from(Buffer.from(text, "utf8").subarray(0, byteIndex).toString("utf8")).length;
}

function isPhoneNumberStart(chars: readonly string[], pos: number): boolean {
  const c = chars[pos];
  if (c === "+" || c === "(") return isDigit(chars[pos + 1]);
  if (!isDigit(c)) return false;
  // do not start inside a longer token such as an order code
  return pos === 0 || !ALPHANUMERIC.test(chars[pos - 1]);
}

interface CandidateSpan {
  start: number;          // char index
  lastDigit: number;      // char index of the final digit consumed
  digits: number;
}

function scanCandidate(chars: readonly string[], start: number): CandidateSpan {
  let pos = start;
  let digits = 0;
  let lastDigit = start;
  let depth = 0;

  while (pos < chars.length) {
    const c = chars[pos];
    if (c === "+" && pos === start) {
      pos++;
    } else if (isDigit(c)) {
      digits++;
      lastDigit = pos;
      pos++;
      if (digits > MAX_CANDIDATE_DIGITS) break;
    } else if (c === "(") {
      depth++;
      pos++;
    } else if (c === ")" && depth > 0) {
      depth--;
      pos++;
    } else if (c === "-" || c === "." || c === " ") {
      const next = chars[pos + 1];
      if (digits === 0 || !(isDigit(next) || next === "(")) break;
      pos++;
    } else {
      break;
    }
  }

  return { start, lastDigit, digits };
}

type Normalizer = (raw: string) => string | null;

function scan(text: string, normalizeSpan: Normalizer): ExtractedPhoneNumber[] {
  const chars = Array.from(text);
  const offsets = byteOffsets(chars);
  const results: ExtractedPhoneNumber[] = [];

  let i = 0;
  while (i < chars.length) {
    if (!isPhoneNumberStart(chars, i)) {
      i++;
      continue;
    }
    const span = scanCandidate(chars, i);
    if (span.digits < MIN_CANDIDATE_DIGITS) {
      i++;
      continue;
    }

    const endChar = span.lastDigit + 1;
    const raw = chars.slice(span.start, endChar).join("");
    const normalized = normalizeSpan(raw);
    results.push({
      raw,
      normalized,
      start: offsets[span.start],
      end: offsets[endChar],
      isValid: normalized !== null,
    });
    i = endChar;
  }

  return results;
}

/** Every phone-number-shaped span in `text`, valid or not, in order. */
export function extractAll(text: string): ExtractedPhoneNumber[] {
  return scan(text, normalize);
}

export function extractValidOnly(text: string): ExtractedPhoneNumber[] {
  return extractAll(text).filter((n) => n.isValid);
}

/**
 * Like `extractAll`, but national numbers are read as belonging to
 * `countryCode`. Spans written without a leading `+` try the hinted country
 * first; spans with one are read as written and fall back to the hint.
 * An unknown country code disables the hint.
 */
export function extractWithCountryHint(text: string, countryCode: string): ExtractedPhoneNumber[] {
  const country = findCountryByIso(countryCode);
  if (!country) return extractAll(text);

  const withHint = (raw: string): string | null =>
    normalize(`+${country.prefix}${stripLeadingZeros(stripNonDigits(raw))}`);

  return scan(text, (raw) => {
    if (raw.startsWith("+")) return normalize(raw) ?? withHint(raw);
    return withHint(raw) ?? normalize(raw);
  });
}

export function countInText(text: string): number {
  return extractAll(text).length;
}

/**
 * Replace each extracted span with `replacement(span)`. Text between spans is
 * copied through byte for byte.
 */
export function replaceInText(text: string, replacement: (n: ExtractedPhoneNumber) => string): string {
  const numbers = extractAll(text);
  if (!numbers.length) return text;

  const bytes = Buffer.from(text, "utf8");
  const parts: string[] = [];
  let lastEnd = 0;
  for (const n of numbers) {
    parts.push(bytes.subarray(lastEnd, n.start).toString("utf8"));
    parts.push(replacement(n));
    lastEnd = n.end;
  }
  parts.push(bytes.subarray(lastEnd).toString("utf8"));
  return parts.join("");
}

export interface RedactOptions {
  /** Trailing digits left readable. 0 hides the whole number. */
  visibleDigits?: number;
  maskChar?: string;
  /** Used when nothing would be masked, or nothing should be shown. */
  placeholder?: string;
}

export function redact(text: string, options: RedactOptions = {}): string {
  const { visibleDigits = 0, maskChar = "*", placeholder = "[PHONE]" } = options;
  return replaceInText(text, (n) => {
    const digits = stripNonDigits(n.raw);
    const total = digits.length;
    if (visibleDigits <= 0 || visibleDigits >= total) return placeholder;
    return maskChar.repeat(total - visibleDigits) + digits.slice(total - visibleDigits);
  });
}
