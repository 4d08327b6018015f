import { findCountryByIso } from "./registry";

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

function randomDigit(random: RandomSource, min = 0): string {
  return String(min + Math.floor(random() * (10 - min)));
}

/**
 * A random number for `countryCode` in E.164 form, using the country's first
 * accepted length. For test data only: the digits are not drawn from real
 * allocated ranges and the source is not cryptographic.
 */
export function generateRandomNumber(countryCode: string, random: RandomSource = Math.random): string | null {
  const country = findCountryByIso(countryCode);
  if (!country) return null;

  const length = country.phoneLengths[0];
  // a leading zero would be read as a trunk prefix
  let national = randomDigit(random, 1);
  for (let i = 1; i < length; i++) national += randomDigit(random);
  return `+${country.prefix}${national}`;
}

export function generateRandomNumbers(countryCode: string, count: number, random: RandomSource = Math.random): string[] {
  const numbers: string[] = [];
  for (let i = 0; i < count; i++) {
    const number = generateRandomNumber(countryCode, random);
    if (!number) break;
    numbers.push(number);
  }
  return numbers;
}
