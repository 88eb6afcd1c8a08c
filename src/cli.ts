/**
 * Command-line front end: `pubmed-bibtex [options] <pmid...>`.
 */

import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { ConfigError, InvalidIdentifierError } from "./errors.js";
import { logger, setLogLevel } from "./logger.js";
import { exitCodeFor, resolveCitations } from "./pipeline.js";
import type { CitationResult, ResolveOptions } from "./pipeline.js";

/** Exit status for bad invocations (no identifiers, unknown options). */
export const USAGE_EXIT_CODE = 2;

export const USAGE = `Usage: pubmed-bibtex [options] <pmid...>

Fetch PubMed records and print them as BibTeX @article entries.

Options:
  -j, --journal <mode>  journal name to use: full, abbrev or iso (default: full)
  -e, --email <address> contact email address sent to NCBI; must be a valid
                        email address (env: PUBMED_BIBTEX_EMAIL)
      --api-key <key>   NCBI API key (env: NCBI_API_KEY)
  -v, --verbose         print debug logging
  -h, --help            show this help
      --version         show the version
`;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      journal: { type: "string", short: "j" },
      email: { type: "string", short: "e" },
      "api-key": { type: "string" },
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean" },
    },
  });
}

function reportFailure(pmid: string, error: Error): void {
  if (error instanceof InvalidIdentifierError) {
    logger.error(error.message);
  } else {
    logger.error(`Failed to resolve ${pmid}: ${error.message}`);
  }
}

/**
 * Run the CLI and return the process exit code: 0 when every identifier
 * resolved, 1 when any failed, 2 for usage errors.
 */
export async function run(argv: string[], io: CliIo = processIo): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    io.stderr(USAGE);
    return USAGE_EXIT_CODE;
  }
  const { values, positionals } = parsed;

  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }
  if (values.version) {
    io.stdout(`${readVersion()}\n`);
    return 0;
  }
  if (positionals.length === 0) {
    io.stderr(USAGE);
    return USAGE_EXIT_CODE;
  }

  let options: ResolveOptions;
  try {
    const config = loadConfig({
      journal: values.journal,
      email: values.email,
      apiKey: values["api-key"],
      verbose: values.verbose,
    });
    setLogLevel(config.verbose ? "debug" : "info");
    options = { journal: config.journal, email: config.email, tool: config.tool };
    if (config.apiKey !== undefined) options.apiKey = config.apiKey;
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    logger.error(err.message);
    io.stderr(USAGE);
    return USAGE_EXIT_CODE;
  }

  logger.debug(`Resolving ${positionals.length} identifier(s), journal mode "${options.journal}"`);

  const results = await resolveCitations(positionals, {
    ...options,
    onResult: (result: CitationResult) => {
      if (result.success) {
        io.stdout(`${result.bibtex}\n\n`);
      } else {
        reportFailure(result.pmid, result.error);
      }
    },
  });

  const failed = results.filter((result) => !result.success).length;
  logger.debug(`${results.length - failed} resolved, ${failed} failed`);
  return exitCodeFor(results);
}
