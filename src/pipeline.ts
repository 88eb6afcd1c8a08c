/**
 * Identifier → BibTeX pipeline.
 *
 * Each PMID is fetched, extracted and rendered on its own; a batch runs
 * them one after another and records a result per identifier.
 */

import { createArticleRecord } from "./bibtex/article.js";
import { InvalidIdentifierError, MissingFieldError, NotFoundError } from "./errors.js";
import type { DiacriticStripper } from "./format.js";
import { fetchPubmedDocument } from "./pubmed/efetch.js";
import type { EfetchOptions } from "./pubmed/efetch.js";
import { extractMetadata } from "./pubmed/extractor.js";
import type { JournalTitleMode } from "./types.js";

export interface ResolveOptions extends EfetchOptions {
  journal: JournalTitleMode;
  stripDiacritics?: DiacriticStripper;
}

export interface BatchOptions extends ResolveOptions {
  /** Called after each identifier, in input order */
  onResult?: (result: CitationResult) => void;
}

export type CitationResult =
  | { pmid: string; success: true; bibtex: string }
  | { pmid: string; success: false; error: Error };

/**
 * Resolve one PMID to a rendered `@article` record.
 *
 * @throws InvalidIdentifierError when PubMed has no record for the PMID or
 *   the record lacks a required field
 * @throws MalformedDocumentError when the response is not well-formed XML
 */
export async function resolveCitation(pmid: string, options: ResolveOptions): Promise<string> {
  try {
    const document = await fetchPubmedDocument(pmid, options);
    const metadata = extractMetadata(document, options.journal, options);
    return createArticleRecord(metadata).render();
  } catch (err) {
    if (err instanceof NotFoundError || err instanceof MissingFieldError) {
      throw new InvalidIdentifierError(pmid, { cause: err });
    }
    throw err;
  }
}

/**
 * Resolve PMIDs sequentially. A failure is recorded for its identifier and
 * the batch moves on.
 */
export async function resolveCitations(
  pmids: string[],
  options: BatchOptions,
): Promise<CitationResult[]> {
  const results: CitationResult[] = [];
  for (const pmid of pmids) {
    let result: CitationResult;
    try {
      result = { pmid, success: true, bibtex: await resolveCitation(pmid, options) };
    } catch (err) {
      result = { pmid, success: false, error: err instanceof Error ? err : new Error(String(err)) };
    }
    results.push(result);
    options.onResult?.(result);
  }
  return results;
}

/** 0 when every identifier resolved, 1 otherwise. */
export function exitCodeFor(results: CitationResult[]): number {
  return results.every((result) => result.success) ? 0 : 1;
}
