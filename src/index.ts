export { containsInvalidCharacter, stripLeadingZeros, stripNonDigits } from "./characterFilter";
export { COUNTRIES, countDigits, findCountryByIso, loadCountryRules, RegistryError } from "./registry";
export type { CountryRule } from "./registry";
export { resolveCountry } from "./resolver";
export {
  areEqual,
  areEqual as equal,
  extractCountry,
  isValid,
  isValid as validate,
  normalize,
  normalizeInPlace,
  parse,
  ParseFailure,
} from "./normalizer";
export type { ParseResult } from "./normalizer";
export {
  classify,
  classifyType,
  isLandlineNumber,
  isMobileNumber,
  isTollFreeNumber,
  PhoneNumberType,
} from "./classifyNumber";
export { formatNationalNumber, formatNumber, PhoneFormat } from "./formatter";
export {
  byteIndexFromCharIndex,
  charIndexFromByteIndex,
  countInText,
  extractAll,
  extractValidOnly,
  extractWithCountryHint,
  MAX_CANDIDATE_DIGITS,
  MIN_CANDIDATE_DIGITS,
  redact,
  replaceInText,
} from "./textScanner";
export type { ExtractedPhoneNumber, RedactOptions } from "./textScanner";
export { PhoneNumber, PhoneNumberSet } from "./phoneNumber";
export {
  analyze,
  analyzeBatch,
  classifyTypesBatch,
  extractCountriesBatch,
  formatBatch,
  groupEquivalent,
  normalizeBatch,
  validateBatch,
} from "./batch";
export type { PhoneNumberAnalysis } from "./batch";
export { guessCountry, isPotentiallyValid, suggestCorrections } from "./suggest";
export { generateRandomNumber, generateRandomNumbers } from "./generator";
export type { RandomSource } from "./generator";
