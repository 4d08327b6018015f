import { stripLeadingZeros, stripNonDigits } from "./characterFilter";
import { classify, PhoneNumberType } from "./classifyNumber";
import { formatNumber, PhoneFormat } from "./formatter";
import { parse } from "./normalizer";
import { CountryRule, findCountryByIso } from "./registry";

/**
 * A parsed number. Two instances are equal when their E.164 forms match,
 * whatever the original formatting.
 */
export class PhoneNumber {
  private constructor(
    readonly original: string,
    readonly e164: string,
    readonly country: CountryRule,
    readonly nationalNumber: string,
    readonly type: PhoneNumberType,
  ) {}

  static parse(input: string): PhoneNumber | null {
    const result = parse(input);
    if (!result.ok) return null;
    return new PhoneNumber(
      input,
      result.e164,
      result.country,
      result.nationalNumber,
      classify(result.nationalNumber, result.country),
    );
  }

  /** Parse as written, or else as a national number of `countryCode`. */
  static parseWithCountry(input: string, countryCode: string): PhoneNumber | null {
    const phone = PhoneNumber.parse(input);
    if (phone) return phone;

    const country = findCountryByIso(countryCode);
    if (!country) return null;

    const hinted = PhoneNumber.parse(`+${country.prefix}${stripLeadingZeros(stripNonDigits(input))}`);
    if (!hinted) return null;
    return new PhoneNumber(input, hinted.e164, hinted.country, hinted.nationalNumber, hinted.type);
  }

  get countryCode(): number {
    return this.country.prefix;
  }

  format(style: PhoneFormat): string {
    return formatNumber(this.e164, style) ?? this.e164;
  }

  isMobile(): boolean {
    return this.type === PhoneNumberType.Mobile;
  }

  isLandline(): boolean {
    return this.type === PhoneNumberType.FixedLine;
  }

  isTollFree(): boolean {
    return this.type === PhoneNumberType.TollFree;
  }

  equals(other: PhoneNumber): boolean {
    return this.e164 === other.e164;
  }

  toString(): string {
    return this.e164;
  }

  toJSON(): { original: string; e164: string; country: string; type: PhoneNumberType } {
    return { original: this.original, e164: this.e164, country: this.country.code, type: this.type };
  }
}

/** Deduplicates numbers by their E.164 form. Insertion order is kept. */
export class PhoneNumberSet implements Iterable<PhoneNumber> {
  private readonly numbers = new Map<string, PhoneNumber>();

  static from(inputs: Iterable<string>): PhoneNumberSet {
    const set = new PhoneNumberSet();
    for (const input of inputs) set.add(input);
    return set;
  }

  /** Returns false when the input is invalid or already present. */
  add(input: string): boolean {
    const phone = PhoneNumber.parse(input);
    if (!phone || this.numbers.has(phone.e164)) return false;
    this.numbers.set(phone.e164, phone);
    return true;
  }

  has(input: string): boolean {
    const result = parse(input);
    return result.ok && this.numbers.has(result.e164);
  }

  /** The stored entry equivalent to `input`. */
  get(input: string): PhoneNumber | null {
    const result = parse(input);
    if (!result.ok) return null;
    return this.numbers.get(result.e164) ?? null;
  }

  delete(input: string): boolean {
    const result = parse(input);
    return result.ok && this.numbers.delete(result.e164);
  }

  get size(): number {
    return this.numbers.size;
  }

  normalizedNumbers(): string[] {
    return Array.from(this.numbers.keys());
  }

  [Symbol.iterator](): Iterator<PhoneNumber> {
    return this.numbers.values();
  }
}
