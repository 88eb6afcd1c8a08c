/**
 * Formatting helpers shared by the extractor and the BibTeX serializer.
 */

import anyAscii from 'any-ascii';

/** Maps a string to a plain-ASCII approximation of it. */
export type DiacriticStripper = (text: string) => string;

/**
 * Replace accented letters with their closest ASCII equivalent.
 * "Éloi" → "Eloi", "Müller" → "Muller".
 */
export const stripDiacritics: DiacriticStripper = (text) => anyAscii(text);

const INTEGER_LITERAL = /^[+-]?\d+$/;

/**
 * Parse a string as an integer literal (optional sign, then digits only).
 * Returns undefined for anything else, including "", "1.5" and "120--135".
 */
export function parseIntegerLiteral(text: string): bigint | undefined {
  const trimmed = text.trim();
  if (!INTEGER_LITERAL.test(trimmed)) return undefined;
  return BigInt(trimmed);
}

/**
 * Wrap each run of uppercase ASCII letters in braces, except a run
 * starting at position 0, so BibTeX styles keep the capitalization.
 * "SCPS: a fast implementation" → "S{CPS}: a fast implementation"
 */
export function protectCapitals(title: string): string {
  return title.replace(/(?<!^)[A-Z]+/g, (run) => `{${run}}`);
}
