/**
 * Error types raised by the extraction pipeline.
 *
 * Library code throws these and never reports them; the CLI decides what
 * the user sees.
 */

export class PubmedBibtexError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required field path resolved to zero matches. */
export class MissingFieldError extends PubmedBibtexError {
  constructor(
    public readonly field: string,
    public readonly path: string,
  ) {
    super(`Required field "${field}" not found at ${path}`);
  }
}

/** The efetch payload did not contain a complete PubmedArticleSet. */
export class NotFoundError extends PubmedBibtexError {
  constructor(public readonly pmid: string) {
    super(`No PubMed record returned for ${pmid}`);
  }
}

/** The identifier does not resolve to a usable PubMed record. */
export class InvalidIdentifierError extends PubmedBibtexError {
  constructor(
    public readonly pmid: string,
    options?: ErrorOptions,
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Invalid PubMed identifier ${pmid}${reason}`, options);
  }
}

/** The fetched text is not well-formed XML. */
export class MalformedDocumentError extends PubmedBibtexError {
  constructor(
    message: string,
    public readonly line?: number,
  ) {
    super(line !== undefined ? `Malformed XML document (line ${line}): ${message}` : `Malformed XML document: ${message}`);
  }
}

/** Configuration values failed validation. */
export class ConfigError extends PubmedBibtexError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join(", ")}`);
  }
}
