import { parse } from "./normalizer";
import type { CountryRule } from "./registry";

export enum PhoneNumberType {
  Mobile = "MOBILE",
  FixedLine = "FIXED_LINE",
  TollFree = "TOLL_FREE",
  PremiumRate = "PREMIUM_RATE",
  SharedCost = "SHARED_COST",
  Voip = "VOIP",
  PersonalNumber = "PERSONAL_NUMBER",
  Pager = "PAGER",
  Uan = "UAN",
  Emergency = "EMERGENCY",
  Voicemail = "VOICEMAIL",
  Unknown = "UNKNOWN",
}

type Classifier = (national: string) => PhoneNumberType;

const NANP_TOLL_FREE = new Set(["800", "833", "844", "855", "866", "877", "888"]);
const NANP_PREMIUM = new Set(["900", "976"]);

// North American Numbering Plan: mobile and landline share number ranges.
function classifyNanp(national: string): PhoneNumberType {
  const firstThree = national.slice(0, 3);
  if (NANP_TOLL_FREE.has(firstThree)) return PhoneNumberType.TollFree;
  if (NANP_PREMIUM.has(firstThree)) return PhoneNumberType.PremiumRate;
  return national.length === 10 ? PhoneNumberType.FixedLine : PhoneNumberType.Unknown;
}

// GB numbers arrive without the trunk 0: 07xxx becomes 7xxx.
function classifyGb(national: string): PhoneNumberType {
  switch (national[0]) {
    case "7":
      return PhoneNumberType.Mobile;
    case "8":
      switch (national.slice(0, 2)) {
        case "80":
        case "84":
        case "87":
          return PhoneNumberType.TollFree;
        case "81":
        case "82":
        case "89":
          return PhoneNumberType.PremiumRate;
        default:
          return PhoneNumberType.SharedCost;
      }
    case "1":
    case "2":
      return PhoneNumberType.FixedLine;
    case "3":
      return PhoneNumberType.Uan;
    case "5":
      return PhoneNumberType.Voip;
    default:
      return PhoneNumberType.Unknown;
  }
}

function classifyDe(national: string): PhoneNumberType {
  switch (national[0]) {
    case "1":
      switch (national.slice(0, 2)) {
        case "15":
        case "16":
        case "17":
          return PhoneNumberType.Mobile;
        case "18":
          return PhoneNumberType.SharedCost;
        case "19":
          return PhoneNumberType.PremiumRate;
        default:
          return PhoneNumberType.Unknown;
      }
    case "0":
      return PhoneNumberType.TollFree;
    default:
      return PhoneNumberType.FixedLine;
  }
}

function classifyFr(national: string): PhoneNumberType {
  switch (national[0]) {
    case "6":
    case "7":
      return PhoneNumberType.Mobile;
    case "8":
      return PhoneNumberType.TollFree;
    case "1":
    case "2":
    case "3":
    case "4":
    case "5":
    case "9":
      return PhoneNumberType.FixedLine;
    default:
      return PhoneNumberType.Unknown;
  }
}

function classifyAu(national: string): PhoneNumberType {
  const firstThree = national.slice(0, 3);
  switch (national[0]) {
    case "4":
      return PhoneNumberType.Mobile;
    case "1":
      if (firstThree === "180" || firstThree === "188") return PhoneNumberType.TollFree;
      if (firstThree === "190") return PhoneNumberType.PremiumRate;
      return PhoneNumberType.Unknown;
    case "2":
    case "3":
    case "7":
    case "8":
      return PhoneNumberType.FixedLine;
    default:
      return PhoneNumberType.Unknown;
  }
}

function classifyIn(national: string): PhoneNumberType {
  const d = national[0];
  if (d >= "6" && d <= "9") return PhoneNumberType.Mobile;
  if (d >= "1" && d <= "5") return PhoneNumberType.FixedLine;
  return PhoneNumberType.Unknown;
}

/**
 * Fallback for countries without a table. Only a rough guess: it will get
 * many real numbers wrong.
 */
function classifyGeneric(national: string): PhoneNumberType {
  const d = national[0];
  if (d >= "6" && d <= "9") return PhoneNumberType.Mobile;
  if (d >= "1" && d <= "5") return PhoneNumberType.FixedLine;
  if (d === "0") return PhoneNumberType.TollFree;
  return PhoneNumberType.Unknown;
}

const CLASSIFIERS: ReadonlyMap<string, Classifier> = new Map<string, Classifier>([
  ["US", classifyNanp],
  ["CA", classifyNanp],
  ["GB", classifyGb],
  ["GB-CYM", classifyGb],
  ["DE", classifyDe],
  ["FR", classifyFr],
  ["AU", classifyAu],
  ["IN", classifyIn],
]);

/** Classify a national number (country code already removed). */
export function classify(national: string, country: CountryRule): PhoneNumberType {
  if (!national) return PhoneNumberType.Unknown;
  const classifier = CLASSIFIERS.get(country.code) ?? classifyGeneric;
  return classifier(national);
}

export function classifyType(raw: string): PhoneNumberType | null {
  const result = parse(raw);
  return result.ok ? classify(result.nationalNumber, result.country) : null;
}

export function isMobileNumber(raw: string): boolean {
  return classifyType(raw) === PhoneNumberType.Mobile;
}

export function isLandlineNumber(raw: string): boolean {
  return classifyType(raw) === PhoneNumberType.FixedLine;
}

export function isTollFreeNumber(raw: string): boolean {
  return classifyType(raw) === PhoneNumberType.TollFree;
}
