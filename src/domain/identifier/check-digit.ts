// ---------------------------------------------------------------------------
// ISBN check-digit computation
// ---------------------------------------------------------------------------

/**
 * Compute the ISBN-10 check digit for a string of exactly 9 digits.
 * Returns a single character: '0'-'9' or 'X'.
 */
export function computeISBN10CheckDigit(first9: string): string {
  if (!/^\d{9}$/.test(first9)) {
    throw new RangeError(`Expected 9 digits, got "${first9}"`);
  }

  let sum = 0;
  for (let i = 0; i < 9; i++) {
    sum += (10 - i) * Number(first9.charAt(i));
  }

  const remainder = (11 - (sum % 11)) % 11;
  return remainder === 10 ? "X" : String(remainder);
}

/**
 * Compute the ISBN-13 check digit for a string of exactly 12 digits.
 */
export function computeISBN13CheckDigit(first12: string): string {
  if (!/^\d{12}$/.test(first12)) {
    throw new RangeError(`Expected 12 digits, got "${first12}"`);
  }

  let sum = 0;
  for (let i = 0; i < 12; i++) {
    const weight = i % 2 === 0 ? 1 : 3;
    sum += weight * Number(first12.charAt(i));
  }

  return String((10 - (sum % 10)) % 10);
}

/**
 * Weighted sum over all ten positions (weights 10..1). 'X' counts as 10 and
 * is only accepted in the last position. Valid iff the sum is divisible by 11.
 */
export function verifyISBN10CheckDigit(isbn10: string): boolean {
  if (!/^\d{9}[\dX]$/.test(isbn10)) return false;

  let sum = 0;
  for (let i = 0; i < 10; i++) {
    const ch = isbn10.charAt(i);
    const digit = ch === "X" ? 10 : Number(ch);
    sum += (10 - i) * digit;
  }
  return sum % 11 === 0;
}

/**
 * Alternating weights 1,3 over all thirteen digits; valid iff the sum is
 * divisible by 10.
 */
export function verifyISBN13CheckDigit(isbn13: string): boolean {
  if (!/^\d{13}$/.test(isbn13)) return false;

  let sum = 0;
  for (let i = 0; i < 13; i++) {
    sum += (i % 2 === 0 ? 1 : 3) * Number(isbn13.charAt(i));
  }
  return sum % 10 === 0;
}
