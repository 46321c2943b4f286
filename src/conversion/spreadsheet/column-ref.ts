/**
 * Spreadsheet column letters <-> 1-based column index.
 *
 * Bijective base-26: A=1 ... Z=26, AA=27, AZ=52, BA=53.
 */

/** Last worksheet column, XFD. */
export const MAX_COLUMNS = 16384;

export function columnIndex(letters: string): number {
  let index = 0;
  for (const char of letters.toUpperCase()) {
    const code = char.charCodeAt(0);
    if (code < 65 || code > 90) {
      throw new RangeError(`Invalid column letters: "${letters}"`);
    }
    index = index * 26 + (code - 64);
  }
  if (index === 0) {
    throw new RangeError('Column letters must not be empty');
  }
  return index;
}

export function columnLetters(index: number): string {
  if (!Number.isInteger(index) || index < 1) {
    throw new RangeError(`Column index must be a positive integer, got ${index}`);
  }
  let letters = '';
  let remaining = index;
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
}

/**
 * Column of a cell reference such as "AB12", or null when the reference
 * has no letter prefix.
 */
export function columnOfReference(reference: string): number | null {
  const match = /^([A-Za-z]+)/.exec(reference.trim());
  return match ? columnIndex(match[1]) : null;
}

/** cellReference(2, 3) -> "B3" */
export function cellReference(column: number, row: number): string {
  return `${columnLetters(column)}${row}`;
}
