import { z } from "zod";
import { DEFAULT_MIN_CONFIDENCE } from "./identity";
import { DEFAULT_DOCUMENT_TYPE_HINT } from "./query-planner";
import { InvalidConfigError } from "./errors";

const count = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const positive = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : null));

export const collectionConfigSchema = z.object({
  lookbackYears: count(5),
  lookaheadYears: count(2),
  referenceYear: z.coerce.number().int().min(1990).max(2100).default(() => new Date().getFullYear()),
  universitiesPerBatch: count(5),
  yearsPerUniversity: count(3),
  bootstrapPerBatch: count(0),
  documentTypeHint: z.string().trim().min(1).default(DEFAULT_DOCUMENT_TYPE_HINT),
  minIdentityConfidence: z.coerce.number().min(0).max(1).default(DEFAULT_MIN_CONFIDENCE),
  referenceDataDir: z.string().min(1).default("data"),
  extractedDir: z.string().min(1).default("extracted_text"),
  downloadsDir: z.string().min(1).default("downloads"),
  progressDir: z.string().min(1).default("data/progress"),
  fetchConcurrency: positive(2),
  extractConcurrency: positive(4),
  resultsPerQuery: positive(5),
  maxIterations: positive(10),
  fetcherCommand: optionalText,
  extractorCommand: optionalText,
});

export type CollectionConfig = z.infer<typeof collectionConfigSchema>;
/** Raw values (strings from argv or numbers from code); the schema coerces them. */
export type ConfigOverrides = Partial<Record<keyof CollectionConfig, unknown>>;

const ENV_KEYS: Record<keyof CollectionConfig, string> = {
  lookbackYears: "GAP_LOOKBACK_YEARS",
  lookaheadYears: "GAP_LOOKAHEAD_YEARS",
  referenceYear: "GAP_REFERENCE_YEAR",
  universitiesPerBatch: "PLAN_UNIVERSITIES_PER_BATCH",
  yearsPerUniversity: "PLAN_YEARS_PER_UNIVERSITY",
  bootstrapPerBatch: "PLAN_BOOTSTRAP_PER_BATCH",
  documentTypeHint: "PLAN_DOCUMENT_HINT",
  minIdentityConfidence: "IDENTITY_MIN_CONFIDENCE",
  referenceDataDir: "REFERENCE_DATA_DIR",
  extractedDir: "EXTRACTED_DIR",
  downloadsDir: "DOWNLOADS_DIR",
  progressDir: "PROGRESS_DIR",
  fetchConcurrency: "FETCH_CONCURRENCY",
  extractConcurrency: "EXTRACT_CONCURRENCY",
  resultsPerQuery: "FETCH_RESULTS_PER_QUERY",
  maxIterations: "MAX_ITERATIONS",
  fetcherCommand: "FETCHER_COMMAND",
  extractorCommand: "EXTRACTOR_COMMAND",
};

/**
 * Environment values first, explicit overrides (CLI flags, tests) on top.
 * Blank environment values count as unset.
 */
export function loadCollectionConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): CollectionConfig {
  const fromEnv: Record<string, string> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== "") fromEnv[field] = value;
  }

  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  const parsed = collectionConfigSchema.safeParse({ ...fromEnv, ...definedOverrides });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigError(`Invalid collection config: ${details}`);
  }
  return parsed.data;
}
