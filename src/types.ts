/**
 * Shared type definitions for PubMed metadata extraction and BibTeX output.
 */

/**
 * Which of the journal's alternate names to use for the `journal` field.
 *
 * - `full`: the journal's full title (`Journal/Title`)
 * - `abbrev`: the NLM title abbreviation (`MedlineJournalInfo/MedlineTA`)
 * - `iso`: the ISO abbreviation (`Journal/ISOAbbreviation`)
 */
export const JOURNAL_TITLE_MODES = ["full", "abbrev", "iso"] as const;

export type JournalTitleMode = (typeof JOURNAL_TITLE_MODES)[number];

/** One author as listed in the source document. */
export interface BibtexAuthor {
  /** Family name, may contain diacritics: "Nepusz", "Éloi" */
  surname: string;
  /** Initials without separators: "T", "JA" */
  initials: string;
}

/**
 * Normalized article metadata, ready to populate a citation record.
 * Optional fields are absent when the source document does not carry them.
 */
export interface ArticleMetadata {
  authors: BibtexAuthor[];
  /** Formatted author list: "Nepusz, T. and Yu, H." */
  author: string;
  /** Entry identifier: "nepusz10" */
  citationKey: string;
  title: string;
  journal: string;
  /** Four-digit year as it appears in the source */
  year: string;
  volume: string;
  /** Page range with doubled hyphens: "120--135" */
  pages: string;
  issue?: string;
  doi?: string;
}

/** A value stored in a citation record field. */
export type FieldValue = string | number;
