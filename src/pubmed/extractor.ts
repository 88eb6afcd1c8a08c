/**
 * Metadata extraction from PubMed efetch documents.
 *
 * Resolves each field by path below `PubmedArticleSet/PubmedArticle` and
 * normalizes it for BibTeX output.
 */

import { generateCitationKey } from "../citation-key.js";
import { MissingFieldError } from "../errors.js";
import { stripDiacritics as defaultStripDiacritics } from "../format.js";
import type { DiacriticStripper } from "../format.js";
import type { ArticleMetadata, BibtexAuthor, JournalTitleMode } from "../types.js";
import { selectChildNodes, selectNodes, selectText } from "./document.js";
import type { OrderedNode, PubmedDocument } from "./document.js";

const ARTICLE_ROOT = "PubmedArticleSet/PubmedArticle";

const PATHS = {
  author: "MedlineCitation/Article/AuthorList/Author",
  title: "MedlineCitation/Article/ArticleTitle",
  year: "MedlineCitation/Article/Journal/JournalIssue/PubDate/Year",
  volume: "MedlineCitation/Article/Journal/JournalIssue/Volume",
  issue: "MedlineCitation/Article/Journal/JournalIssue/Issue",
  pages: "MedlineCitation/Article/Pagination/MedlinePgn",
  doi: 'PubmedData/ArticleIdList/ArticleId[@IdType="doi"]',
} as const;

/** Journal name path for each title mode. */
export const JOURNAL_PATHS: Record<JournalTitleMode, string> = {
  full: "MedlineCitation/Article/Journal/Title",
  abbrev: "MedlineCitation/MedlineJournalInfo/MedlineTA",
  iso: "MedlineCitation/Article/Journal/ISOAbbreviation",
};

const ELECTRONIC_RESOURCE_SUFFIX = " [electronic resource]";

export interface ExtractOptions {
  /** Accent stripping used for the citation key. Defaults to any-ascii. */
  stripDiacritics?: DiacriticStripper;
}

// ─── Lookup ──────────────────────────────────────────────────────────

function findArticle(document: PubmedDocument): OrderedNode {
  const article = selectNodes(document, ARTICLE_ROOT).at(0);
  if (!article) throw new MissingFieldError("article", ARTICLE_ROOT);
  return article;
}

function optionalText(article: OrderedNode, path: string): string | undefined {
  return selectText(article, path).at(0);
}

function requiredText(article: OrderedNode, field: string, path: string): string {
  const value = optionalText(article, path);
  if (value === undefined) throw new MissingFieldError(field, `${ARTICLE_ROOT}/${path}`);
  return value;
}

// ─── Field Normalization ─────────────────────────────────────────────

/**
 * Pair each author's LastName with its Initials.
 * Authors without a LastName (collective names) are skipped.
 */
function parseAuthors(article: OrderedNode): BibtexAuthor[] {
  const authors: BibtexAuthor[] = [];
  for (const node of selectChildNodes(article, PATHS.author)) {
    const surname = selectText(node, "LastName").at(0);
    if (surname === undefined) continue;
    const initials = selectText(node, "Initials").at(0);
    if (initials === undefined) {
      throw new MissingFieldError("initials", `${ARTICLE_ROOT}/${PATHS.author}/Initials`);
    }
    authors.push({ surname, initials });
  }
  if (authors.length === 0) {
    throw new MissingFieldError("author", `${ARTICLE_ROOT}/${PATHS.author}/LastName`);
  }
  return authors;
}

/** "Nepusz", "JA" → "Nepusz, J.A." */
export function formatAuthor(author: BibtexAuthor): string {
  const initials = [...author.initials].map((initial) => `${initial}.`).join("");
  return `${author.surname}, ${initials}`;
}

export function formatAuthors(authors: BibtexAuthor[]): string {
  return authors.map(formatAuthor).join(" and ");
}

/** Trim and drop a single trailing period. */
export function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  return trimmed.endsWith(".") ? trimmed.slice(0, -1) : trimmed;
}

export function normalizeJournal(journal: string): string {
  return journal.endsWith(ELECTRONIC_RESOURCE_SUFFIX)
    ? journal.slice(0, -ELECTRONIC_RESOURCE_SUFFIX.length)
    : journal;
}

/** Double every hyphen: "120-135" → "120--135". Not range-aware. */
export function normalizePages(pages: string): string {
  return pages.replaceAll("-", "--");
}

// ─── Extraction ──────────────────────────────────────────────────────

/**
 * Extract normalized article metadata from a parsed efetch document.
 *
 * @param journalTitleMode - Which journal name to use: full title, NLM
 *   abbreviation, or ISO abbreviation
 * @throws MissingFieldError when a required field has no match
 */
export function extractMetadata(
  document: PubmedDocument,
  journalTitleMode: JournalTitleMode,
  options?: ExtractOptions,
): ArticleMetadata {
  const article = findArticle(document);

  const authors = parseAuthors(article);
  const title = normalizeTitle(requiredText(article, "title", PATHS.title));
  const year = requiredText(article, "year", PATHS.year);
  const volume = requiredText(article, "volume", PATHS.volume);
  const pages = normalizePages(requiredText(article, "pages", PATHS.pages));
  const journal = normalizeJournal(
    requiredText(article, "journal", JOURNAL_PATHS[journalTitleMode]),
  );
  const issue = optionalText(article, PATHS.issue);
  const doi = optionalText(article, PATHS.doi);

  const firstAuthor = authors.at(0);
  if (!firstAuthor) throw new MissingFieldError("author", `${ARTICLE_ROOT}/${PATHS.author}`);

  const metadata: ArticleMetadata = {
    authors,
    author: formatAuthors(authors),
    citationKey: generateCitationKey(
      firstAuthor.surname,
      year,
      options?.stripDiacritics ?? defaultStripDiacritics,
    ),
    title,
    journal,
    year,
    volume,
    pages,
  };
  if (issue !== undefined) metadata.issue = issue;
  if (doi !== undefined) metadata.doi = doi;
  return metadata;
}
