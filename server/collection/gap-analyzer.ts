import { formatFinancialYear } from "./financial-year";
import { compareNames, type CanonicalUniversityKey, type University } from "./identity";
import type { Inventory } from "./inventory";

export interface GapWindow {
  lookbackYears: number;
  lookaheadYears: number;
}

export interface YearRange {
  start: number;
  end: number;
}

export interface UniversityGaps {
  university: University;
  /** Every known year, ascending, including years outside the window. */
  knownYears: number[];
  /** Window years with no document, newest first. Empty when fully covered. */
  missingYears: number[];
}

export interface GapSet {
  referenceYear: number;
  range: YearRange;
  /** Every university with at least one known year, sorted by canonical name. */
  universities: ReadonlyMap<CanonicalUniversityKey, UniversityGaps>;
  /** Universities with no known year at all; they need a bootstrap task, not gaps. */
  unstarted: University[];
}

export function yearRange(window: GapWindow, referenceYear: number): YearRange {
  for (const [name, value] of Object.entries({ ...window, referenceYear })) {
    if (!Number.isInteger(value) || (name !== "referenceYear" && value < 0)) {
      throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
    }
  }
  return {
    start: referenceYear - window.lookbackYears,
    end: referenceYear + window.lookaheadYears,
  };
}

/**
 * Missing (university, year) pairs inside
 * [referenceYear - lookback, referenceYear + lookahead].
 *
 * `universe` lists institutions expected to have documents; any of them absent
 * from the inventory is reported as unstarted.
 */
export function computeGaps(
  inventory: Inventory,
  window: GapWindow,
  referenceYear: number,
  options: { universe?: readonly University[] } = {},
): GapSet {
  const range = yearRange(window, referenceYear);
  const universities = new Map<CanonicalUniversityKey, UniversityGaps>();
  const unstarted = new Map<CanonicalUniversityKey, University>();

  inventory.forEach((entry, key) => {
    if (entry.years.length === 0) {
      unstarted.set(key, entry.university);
      return;
    }
    const present = new Set(entry.years);
    const missingYears: number[] = [];
    for (let year = range.end; year >= range.start; year--) {
      if (!present.has(year)) missingYears.push(year);
    }
    universities.set(key, {
      university: entry.university,
      knownYears: [...entry.years],
      missingYears,
    });
  });

  for (const university of options.universe ?? []) {
    if (!inventory.has(university.key)) unstarted.set(university.key, university);
  }

  const sortedGaps = new Map(
    Array.from(universities.entries()).sort(([, a], [, b]) =>
      compareNames(a.university.canonicalName, b.university.canonicalName),
    ),
  );

  return {
    referenceYear,
    range,
    universities: sortedGaps,
    unstarted: Array.from(unstarted.values()).sort((a, b) => compareNames(a.canonicalName, b.canonicalName)),
  };
}

export function totalGapCount(gapSet: GapSet): number {
  let total = 0;
  gapSet.universities.forEach((gaps) => {
    total += gaps.missingYears.length;
  });
  return total;
}

/** True when no university has a missing year inside the window. */
export function isFullyCovered(gapSet: GapSet): boolean {
  return totalGapCount(gapSet) === 0;
}

export interface SerializedUniversityGaps {
  university: string;
  domain: string | null;
  knownYears: number[];
  missingYears: number[];
  missingLabels: string[];
}

export interface SerializedGapSet {
  referenceYear: number;
  range: YearRange;
  totalMissing: number;
  universities: SerializedUniversityGaps[];
  unstarted: string[];
}

export function serializeGapSet(gapSet: GapSet): SerializedGapSet {
  return {
    referenceYear: gapSet.referenceYear,
    range: { ...gapSet.range },
    totalMissing: totalGapCount(gapSet),
    universities: Array.from(gapSet.universities.values()).map((gaps) => ({
      university: gaps.university.canonicalName,
      domain: gaps.university.domain,
      knownYears: [...gaps.knownYears],
      missingYears: [...gaps.missingYears],
      missingLabels: gaps.missingYears.map(formatFinancialYear),
    })),
    unstarted: gapSet.unstarted.map((u) => u.canonicalName),
  };
}
