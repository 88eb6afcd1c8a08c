/**
 * PubMed record fetcher via E-utilities efetch.
 *
 * API: https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi?db=pubmed&id={pmid}&retmode=xml
 */

import { NotFoundError } from "../errors.js";
import { parsePubmedXml } from "./document.js";
import type { PubmedDocument } from "./document.js";

const EFETCH_URL = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi";

/** Every complete efetch response ends its article set with this tag. */
const ARTICLE_SET_CLOSE = "</PubmedArticleSet>";

export interface EfetchOptions {
  /** Contact address NCBI asks every E-utilities client to send */
  email: string;
  /** Client name sent as `tool` */
  tool?: string;
  /** NCBI API key, raises the request rate limit */
  apiKey?: string;
}

function buildUrl(pmid: string, options: EfetchOptions): string {
  const params = new URLSearchParams({
    db: "pubmed",
    id: pmid,
    retmode: "xml",
    email: options.email,
  });
  if (options.tool) params.set("tool", options.tool);
  if (options.apiKey) params.set("api_key", options.apiKey);
  return `${EFETCH_URL}?${params.toString()}`;
}

/**
 * Fetch the raw efetch XML for one PMID.
 *
 * @throws NotFoundError when the payload is not a complete PubmedArticleSet
 */
export async function fetchPubmedXml(pmid: string, options: EfetchOptions): Promise<string> {
  const response = await fetch(buildUrl(pmid, options));

  if (!response.ok) {
    throw new Error(`PubMed efetch error: HTTP ${response.status} ${response.statusText}`);
  }

  const text = await response.text();
  if (!text.includes(ARTICLE_SET_CLOSE)) {
    throw new NotFoundError(pmid);
  }
  return text;
}

/** Fetch and parse the efetch document for one PMID. */
export async function fetchPubmedDocument(
  pmid: string,
  options: EfetchOptions,
): Promise<PubmedDocument> {
  return parsePubmedXml(await fetchPubmedXml(pmid, options));
}
