import { formatFinancialYear } from "./financial-year";
import type { GapSet, UniversityGaps } from "./gap-analyzer";
import { compareNames, type CanonicalUniversityKey, type University } from "./identity";

export interface BatchLimit {
  universitiesPerBatch: number;
  yearsPerUniversity: number;
  /** Universities with no record at all that get a first-acquisition task. */
  bootstrapPerBatch?: number;
}

export interface QueryOptions {
  documentTypeHint?: string;
}

export const DEFAULT_DOCUMENT_TYPE_HINT = "financial statements";

/**
 * `domain` scopes the search to the institution's own site; the fetcher must
 * still check every result against it before accepting a document.
 */
interface SearchTaskBase {
  university: University;
  query: string;
  /** 0 is the most urgent. */
  priority: number;
  scope: "domain" | "name";
  domain: string | null;
}

export interface GapSearchTask extends SearchTaskBase {
  kind: "gap";
  year: number;
}

export interface BootstrapSearchTask extends SearchTaskBase {
  kind: "bootstrap";
  year: null;
}

export type SearchTask = GapSearchTask | BootstrapSearchTask;

export function taskId(task: Pick<SearchTask, "university" | "year">): string {
  return `${task.university.key}:${task.year ?? "bootstrap"}`;
}

/**
 * Deterministic query for one university and (optionally) one financial year.
 *
 *   site:aru.ac.uk "financial statements" 2023-24
 *   "Plymouth College of Art" "financial statements" 2023-24 site:ac.uk
 */
export function buildSearchQuery(
  university: University,
  year: number | null,
  documentTypeHint = DEFAULT_DOCUMENT_TYPE_HINT,
): { query: string; scope: SearchTask["scope"] } {
  const hint = `"${documentTypeHint.replace(/"/g, "").trim()}"`;
  const yearPart = year === null ? [] : [formatFinancialYear(year)];

  if (university.domain) {
    return { query: [`site:${university.domain}`, hint, ...yearPart].join(" "), scope: "domain" };
  }
  const name = `"${university.canonicalName.replace(/"/g, "")}"`;
  return { query: [name, hint, ...yearPart, "site:ac.uk"].join(" "), scope: "name" };
}

function assertLimit(name: string, value: number) {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Universities with gaps, fewest known years first, then by canonical name.
 */
export function selectUniversities(gapSet: GapSet, limit: number): UniversityGaps[] {
  assertLimit("universitiesPerBatch", limit);
  return Array.from(gapSet.universities.values())
    .filter((gaps) => gaps.missingYears.length > 0)
    .sort(
      (a, b) =>
        a.knownYears.length - b.knownYears.length ||
        compareNames(a.university.canonicalName, b.university.canonicalName),
    )
    .slice(0, limit);
}

/**
 * Ordered, duplicate-free search tasks for one batch. An empty GapSet gives an
 * empty plan. Tasks do not depend on each other and may run in any order.
 */
export function planQueries(gapSet: GapSet, batchLimit: BatchLimit, options: QueryOptions = {}): SearchTask[] {
  assertLimit("yearsPerUniversity", batchLimit.yearsPerUniversity);
  const bootstrapLimit = batchLimit.bootstrapPerBatch ?? 0;
  assertLimit("bootstrapPerBatch", bootstrapLimit);

  const tasks: SearchTask[] = [];
  const seen = new Set<string>();

  for (const gaps of selectUniversities(gapSet, batchLimit.universitiesPerBatch)) {
    for (const year of gaps.missingYears.slice(0, batchLimit.yearsPerUniversity)) {
      const id = taskId({ university: gaps.university, year });
      if (seen.has(id)) continue;
      seen.add(id);
      const { query, scope } = buildSearchQuery(gaps.university, year, options.documentTypeHint);
      tasks.push({
        kind: "gap",
        university: gaps.university,
        year,
        query,
        scope,
        domain: gaps.university.domain,
        priority: tasks.length,
      });
    }
  }

  const bootstrapKeys = new Set<CanonicalUniversityKey>();
  for (const university of gapSet.unstarted) {
    if (bootstrapKeys.size >= bootstrapLimit) break;
    if (bootstrapKeys.has(university.key)) continue;
    bootstrapKeys.add(university.key);
    const { query, scope } = buildSearchQuery(university, null, options.documentTypeHint);
    tasks.push({
      kind: "bootstrap",
      university,
      year: null,
      query,
      scope,
      domain: university.domain,
      priority: tasks.length,
    });
  }

  return tasks;
}
