import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { InvalidConfigError, UnresolvedIdentityError } from "./errors";

/** Join key across every record: the compare key of the canonical name. */
export type CanonicalUniversityKey = string;

export interface University {
  key: CanonicalUniversityKey;
  canonicalName: string;
  providerId: string | null;
  domain: string | null;
  country: string | null;
}

export type MatchStrategy = "exact" | "normalized" | "qualifier" | "alias" | "fuzzy";

export interface IdentityMatch {
  university: University;
  matchedBy: MatchStrategy;
  confidence: number;
}

export interface ReferenceTable {
  universities: University[];
  /** alias → canonical name */
  aliases: Record<string, string>;
}

const referenceEntrySchema = z.object({
  name: z.string().min(1),
  country: z.string().optional(),
  domain: z.string().optional(),
  providerId: z.string().optional(),
});

const aliasTableSchema = z.record(z.string(), z.string());

const CONFIDENCE: Record<Exclude<MatchStrategy, "fuzzy">, number> = {
  exact: 1,
  normalized: 0.95,
  qualifier: 0.9,
  alias: 0.9,
};
const FUZZY_WEIGHT = 0.85;
export const DEFAULT_MIN_CONFIDENCE = 0.75;

/** Words that mark a campus or department suffix on an institution name. */
const QUALIFIER_WORDS = new Set(["campus", "campuses", "site", "department", "dept", "faculty", "centre", "center"]);

/** Ignored when comparing token sets. */
const STOPWORDS = new Set(["university", "univ", "uni", "of", "the", "and", "at", "in", "for"]);

/**
 * Case, accent, apostrophe and punctuation-insensitive form of a name.
 * "King’s College London" and "King s College London" → "kings college london";
 * a leading "the" is dropped.
 */
export function toCompareKey(name: string): string {
  return name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/['’‘`]/g, "")
    .replace(/&/g, " and ")
    .replace(/[^a-z0-9]+/g, " ")
    .trim()
    // "King_s" from a sanitised filename
    .replace(/([a-z0-9]) s\b/g, "$1s")
    .replace(/^the /, "");
}

function significantTokens(key: string): Set<string> {
  return new Set(key.split(" ").filter((t) => t.length > 0 && !STOPWORDS.has(t)));
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  a.forEach((t) => {
    if (b.has(t)) shared++;
  });
  return shared / (a.size + b.size - shared);
}

/** Share of the longer key covered when one key appears whole inside the other. */
function containment(raw: string, known: string): number {
  if (` ${raw} `.includes(` ${known} `)) return known.length / raw.length;
  if (` ${known} `.includes(` ${raw} `)) return raw.length / known.length;
  return 0;
}

/** Shorter forms of a name with campus/department qualifiers removed, longest first. */
function stripQualifiers(raw: string): string[] {
  const out: string[] = [];

  const segments = raw.split(",");
  for (let i = segments.length - 1; i >= 1; i--) {
    out.push(segments.slice(0, i).join(","));
  }

  if (/\(.*\)/.test(raw)) out.push(raw.replace(/\([^)]*\)/g, " "));

  const dashed = raw.split(/\s[-–—]\s/);
  if (dashed.length > 1) out.push(dashed[0]);

  const tokens = toCompareKey(raw).split(" ");
  if (tokens.some((t) => QUALIFIER_WORDS.has(t))) {
    for (let n = tokens.length - 1; n >= 1; n--) {
      out.push(tokens.slice(0, n).join(" "));
    }
  }

  return out;
}

export class IdentityResolver {
  private readonly byName = new Map<string, University>();
  private readonly byKey = new Map<CanonicalUniversityKey, University>();
  private readonly aliasKeys = new Map<string, University>();
  private readonly ordered: University[];
  readonly minConfidence: number;

  constructor(table: ReferenceTable, options: { minConfidence?: number } = {}) {
    this.minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;

    for (const university of table.universities) {
      if (this.byKey.has(university.key)) {
        throw new InvalidConfigError(
          `Reference table has two institutions with the key "${university.key}"`,
        );
      }
      this.byKey.set(university.key, university);
      this.byName.set(university.canonicalName, university);
    }

    for (const [alias, canonicalName] of Object.entries(table.aliases)) {
      const target = this.byName.get(canonicalName) ?? this.byKey.get(toCompareKey(canonicalName));
      if (!target) {
        throw new InvalidConfigError(`Alias "${alias}" points at unknown institution "${canonicalName}"`);
      }
      this.aliasKeys.set(toCompareKey(alias), target);
    }

    this.ordered = Array.from(this.byKey.values()).sort((a, b) => compareNames(a.canonicalName, b.canonicalName));
  }

  /** Every institution in the reference table, sorted by canonical name. */
  get universities(): readonly University[] {
    return this.ordered;
  }

  get(key: CanonicalUniversityKey): University | undefined {
    return this.byKey.get(key);
  }

  /** Canonical key for a raw name; throws UnresolvedIdentityError. */
  normalize(rawName: string): CanonicalUniversityKey {
    return this.resolve(rawName).university.key;
  }

  resolve(rawName: string): IdentityMatch {
    const result = this.attempt(rawName);
    if ("university" in result) return result;
    throw new UnresolvedIdentityError(rawName, result.bestCandidate, result.confidence);
  }

  match(rawName: string): IdentityMatch | null {
    const result = this.attempt(rawName);
    return "university" in result ? result : null;
  }

  private attempt(
    rawName: string,
  ): IdentityMatch | { bestCandidate: string | null; confidence: number } {
    const trimmed = rawName.trim().replace(/\s+/g, " ");
    if (!trimmed) return { bestCandidate: null, confidence: 0 };

    const exact = this.byName.get(trimmed);
    if (exact) return { university: exact, matchedBy: "exact", confidence: CONFIDENCE.exact };

    const key = toCompareKey(trimmed);
    const normalized = this.byKey.get(key);
    if (normalized) return { university: normalized, matchedBy: "normalized", confidence: CONFIDENCE.normalized };

    const aliased = this.aliasKeys.get(key);
    if (aliased) return { university: aliased, matchedBy: "alias", confidence: CONFIDENCE.alias };

    for (const shorter of stripQualifiers(trimmed)) {
      const shorterKey = toCompareKey(shorter);
      const parent = this.byKey.get(shorterKey) ?? this.aliasKeys.get(shorterKey);
      if (parent) return { university: parent, matchedBy: "qualifier", confidence: CONFIDENCE.qualifier };
    }

    return this.fuzzy(key);
  }

  private fuzzy(key: string): IdentityMatch | { bestCandidate: string | null; confidence: number } {
    const rawTokens = significantTokens(key);
    const scores = new Map<CanonicalUniversityKey, number>();

    const consider = (knownKey: string, university: University) => {
      const score = Math.max(jaccard(rawTokens, significantTokens(knownKey)), containment(key, knownKey));
      if (score > (scores.get(university.key) ?? 0)) scores.set(university.key, score);
    };
    this.byKey.forEach((university, knownKey) => consider(knownKey, university));
    this.aliasKeys.forEach((university, aliasKey) => consider(aliasKey, university));

    let best: University | null = null;
    let bestScore = 0;
    let tied = false;
    for (const university of this.ordered) {
      const score = scores.get(university.key) ?? 0;
      if (score > bestScore) {
        best = university;
        bestScore = score;
        tied = false;
      } else if (score > 0 && score === bestScore) {
        tied = true;
      }
    }

    const confidence = bestScore * FUZZY_WEIGHT;
    if (!best || tied || confidence < this.minConfidence) {
      return { bestCandidate: best?.canonicalName ?? null, confidence };
    }
    return { university: best, matchedBy: "fuzzy", confidence };
  }
}

/** Code-point order; stable regardless of locale. */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function createUniversity(entry: {
  name: string;
  country?: string | null;
  domain?: string | null;
  providerId?: string | null;
}): University {
  return {
    key: toCompareKey(entry.name),
    canonicalName: entry.name,
    providerId: entry.providerId ?? null,
    domain: entry.domain ? entry.domain.toLowerCase() : null,
    country: entry.country ?? null,
  };
}

/**
 * Reads `universities.json` and `university-aliases.json` from a data directory.
 */
export function loadReferenceTable(dataDir: string): ReferenceTable {
  const universitiesPath = path.join(dataDir, "universities.json");
  const aliasesPath = path.join(dataDir, "university-aliases.json");

  const entries = readJson(universitiesPath, z.array(referenceEntrySchema));
  const aliases = fs.existsSync(aliasesPath) ? readJson(aliasesPath, aliasTableSchema) : {};

  return {
    universities: entries.map(createUniversity),
    aliases,
  };
}

function readJson<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new InvalidConfigError(`Cannot read reference data ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigError(`Invalid reference data ${filePath}: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }
  return parsed.data;
}
