/**
 * Spreadsheet column letters <-> zero-based ordinals
 */

import { CatalogError } from "../errors.js";

const ALPHABET_SIZE = 26;
const CHAR_CODE_A = "A".charCodeAt(0);

/**
 * Decode a base-26 column code: `A` -> 0, `Z` -> 25, `AA` -> 26, `AZ` -> 51
 */
export function columnCodeToOrdinal(code: string): number {
  const letters = code.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(letters)) {
    throw new CatalogError(`Invalid column code "${code}"`);
  }

  let result = 0;
  for (const letter of letters) {
    result = result * ALPHABET_SIZE + (letter.charCodeAt(0) - CHAR_CODE_A + 1);
  }
  return result - 1;
}

/**
 * Encode a zero-based ordinal: 0 -> `A`, 26 -> `AA`
 */
export function ordinalToColumnCode(ordinal: number): string {
  if (!Number.isInteger(ordinal) || ordinal < 0) {
    throw new RangeError(`Invalid column ordinal ${String(ordinal)}`);
  }

  let remaining = ordinal + 1;
  let code = "";
  while (remaining > 0) {
    const rem = (remaining - 1) % ALPHABET_SIZE;
    code = String.fromCharCode(CHAR_CODE_A + rem) + code;
    remaining = Math.floor((remaining - 1) / ALPHABET_SIZE);
  }
  return code;
}
