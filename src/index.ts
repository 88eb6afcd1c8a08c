/**
 * # pubmed-bibtex
 *
 * Fetch PubMed article metadata and render it as BibTeX `@article` records.
 *
 * ## Workflow
 *
 * 1. **Fetch** — Retrieve the efetch XML for a PMID from NCBI E-utilities.
 * 2. **Extract** — Resolve authors, title, journal, year, volume, issue, pages
 *    and DOI by path and normalize them.
 * 3. **Render** — Build a {@link BibtexRecord} and serialize it.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { resolveCitation } from "pubmed-bibtex";
 *
 * const bibtex = await resolveCitation("20154675", {
 *   email: "you@example.com",
 *   journal: "iso",
 * });
 * // @article{nepusz10,
 * //   author = {Nepusz, T. and Sasidharan, R. and Paccanaro, A.},
 * //   ...
 * ```
 *
 * Working from XML you already have:
 *
 * ```typescript
 * import { createArticleRecord, extractMetadata, parsePubmedXml } from "pubmed-bibtex";
 *
 * const metadata = extractMetadata(parsePubmedXml(xml), "full");
 * console.log(createArticleRecord(metadata).render());
 * ```
 *
 * ## Modules
 *
 * - **Pipeline**: {@link resolveCitation}, {@link resolveCitations}, {@link exitCodeFor}
 * - **PubMed**: {@link fetchPubmedXml}, {@link fetchPubmedDocument}, {@link parsePubmedXml}, {@link extractMetadata}
 * - **BibTeX**: {@link BibtexRecord}, {@link createArticleRecord}
 * - **Utilities**: {@link generateCitationKey}, {@link stripDiacritics}, {@link loadConfig}
 *
 * @module pubmed-bibtex
 */

// === Pipeline ===
export { resolveCitation, resolveCitations, exitCodeFor } from "./pipeline.js";
export type { BatchOptions, CitationResult, ResolveOptions } from "./pipeline.js";

// === PubMed ===
export { fetchPubmedXml, fetchPubmedDocument } from "./pubmed/efetch.js";
export type { EfetchOptions } from "./pubmed/efetch.js";
export { parsePubmedXml, selectNodes, selectChildNodes, selectText, nodeText, nodeAttr } from "./pubmed/document.js";
export type { OrderedNode, PubmedDocument } from "./pubmed/document.js";
export {
  extractMetadata,
  formatAuthor,
  formatAuthors,
  normalizeJournal,
  normalizePages,
  normalizeTitle,
  JOURNAL_PATHS,
} from "./pubmed/extractor.js";
export type { ExtractOptions } from "./pubmed/extractor.js";

// === BibTeX ===
export { BibtexRecord, formatFieldValue } from "./bibtex/record.js";
export { createArticleRecord, ARTICLE_ENTRY_TYPE } from "./bibtex/article.js";

// === Utilities ===
export { generateCitationKey } from "./citation-key.js";
export { stripDiacritics, parseIntegerLiteral, protectCapitals } from "./format.js";
export type { DiacriticStripper } from "./format.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { Config, ConfigOverrides } from "./config.js";

// === Errors ===
export {
  PubmedBibtexError,
  MissingFieldError,
  NotFoundError,
  InvalidIdentifierError,
  MalformedDocumentError,
  ConfigError,
} from "./errors.js";

// === Types ===
export { JOURNAL_TITLE_MODES } from "./types.js";
export type { ArticleMetadata, BibtexAuthor, FieldValue, JournalTitleMode } from "./types.js";
