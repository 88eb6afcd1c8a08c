/**
 * Run configuration: command-line values layered over environment variables.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { JOURNAL_TITLE_MODES } from "./types.js";

export const DEFAULT_EMAIL = "anonymous@example.com";
export const DEFAULT_TOOL = "pubmed-bibtex";

export const ConfigSchema = z.object({
  journal: z.enum(JOURNAL_TITLE_MODES).default("full"),
  email: z.string().email().default(DEFAULT_EMAIL),
  tool: z.string().min(1).default(DEFAULT_TOOL),
  apiKey: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Values given on the command line; undefined falls back to the environment. */
export interface ConfigOverrides {
  journal?: string | undefined;
  email?: string | undefined;
  apiKey?: string | undefined;
  verbose?: boolean | undefined;
}

/**
 * Build the configuration.
 *
 * Environment: `PUBMED_BIBTEX_JOURNAL`, `PUBMED_BIBTEX_EMAIL`, `NCBI_API_KEY`.
 *
 * @throws ConfigError listing every invalid value
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const result = ConfigSchema.safeParse({
    journal: overrides.journal ?? (env.PUBMED_BIBTEX_JOURNAL || undefined),
    email: overrides.email ?? (env.PUBMED_BIBTEX_EMAIL || undefined),
    apiKey: overrides.apiKey ?? (env.NCBI_API_KEY || undefined),
    verbose: overrides.verbose,
  });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return result.data;
}
