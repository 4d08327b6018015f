/**
 * True when `input` holds anything other than ASCII digits, spaces, hyphens,
 * balanced parentheses and a single leading `+`.
 */
export function containsInvalidCharacter(input: string): boolean {
  let depth = 0;
  for (let i = 0; i < input.length; i++) {
    const c = input[i];
    if (c >= "0" && c <= "9") continue;
    switch (c) {
      case " ":
      case "-":
        break;
      case "+":
        if (i !== 0) return true;
        break;
      case "(":
        depth++;
        break;
      case ")":
        if (depth === 0) return true;
        depth--;
        break;
      default:
        return true;
    }
  }
  return depth !== 0;
}

export function stripNonDigits(input: string): string {
  return input.replace(/[^0-9]+/g, "");
}

export function stripLeadingZeros(digits: string): string {
  let i = 0;
  while (i < digits.length && digits[i] === "0") i++;
  return i === 0 ? digits : digits.slice(i);
}
