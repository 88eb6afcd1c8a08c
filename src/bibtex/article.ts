/**
 * Builds a BibTeX `@article` record from extracted metadata.
 */

import type { ArticleMetadata } from "../types.js";
import { BibtexRecord } from "./record.js";

export const ARTICLE_ENTRY_TYPE = "article";

/** Create an `@article` record. `number` and `doi` are set only when present. */
export function createArticleRecord(metadata: ArticleMetadata): BibtexRecord {
  const record = new BibtexRecord(ARTICLE_ENTRY_TYPE, metadata.citationKey)
    .set("author", metadata.author)
    .set("title", metadata.title)
    .set("journal", metadata.journal)
    .set("year", metadata.year)
    .set("volume", metadata.volume)
    .set("pages", metadata.pages);

  if (metadata.issue !== undefined) record.set("number", metadata.issue);
  if (metadata.doi !== undefined) record.set("doi", metadata.doi);
  return record;
}
