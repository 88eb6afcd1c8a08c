/**
 * Citation key generation for BibTeX entries.
 */

import { stripDiacritics as defaultStripDiacritics } from './format.js';
import type { DiacriticStripper } from './format.js';

/**
 * Generate a citation key from the first author's surname and the year.
 * Format: {surname-lowercase-ascii}{last two digits of year}
 *
 * The surname is accent-stripped, then lower-cased; nothing else is removed,
 * so "O'Brien" yields "o'brien".
 */
export function generateCitationKey(
  surname: string,
  year: string,
  stripDiacritics: DiacriticStripper = defaultStripDiacritics,
): string {
  const normalizedSurname = stripDiacritics(surname).toLowerCase();
  return `${normalizedSurname}${year.slice(-2)}`;
}
