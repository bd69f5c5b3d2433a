/**
 * Financial years are identified by the calendar year in which they end:
 * "2022-23", "2022-2023", "2022_23" and "accounts2223" all mean 2023.
 */

export const UNKNOWN_YEAR = "unknown" as const;
export type UnknownYear = typeof UNKNOWN_YEAR;

export const MIN_FINANCIAL_YEAR = 1990;
export const MAX_FINANCIAL_YEAR = 2100;

const RANGE_REGEX = /(?<![0-9])(\d{4})[-_/](\d{4}|\d{2})(?![0-9])/g;
const COMPACT_REGEX = /(?:accounts|statements|fs)[-_]?(\d{2})(\d{2})(?![0-9])/gi;
const SINGLE_REGEX = /(?<![0-9])(\d{4})(?![0-9])/g;

export function isPlausibleYear(year: number): boolean {
  return Number.isInteger(year) && year >= MIN_FINANCIAL_YEAR && year <= MAX_FINANCIAL_YEAR;
}

/** "2023-24" for 2024. */
export function formatFinancialYear(endingYear: number): string {
  const start = endingYear - 1;
  return `${start}-${String(endingYear % 100).padStart(2, "0")}`;
}

/**
 * Ending year of a `start-end` pair, or null when `end` does not follow
 * `start` (e.g. "2023-10" is a date, not a financial year).
 */
function rangeEndingYear(start: number, endDigits: string): number | null {
  if (endDigits.length === 4) {
    const end = parseInt(endDigits, 10);
    return end === start + 1 ? end : null;
  }
  const end = parseInt(endDigits, 10);
  return end === (start + 1) % 100 ? start + 1 : null;
}

function expandTwoDigitYear(twoDigits: number): number {
  return twoDigits >= 90 ? 1900 + twoDigits : 2000 + twoDigits;
}

/**
 * All distinct ending years mentioned in a piece of text, ascending.
 * Ranges are consumed first so "2022-23" does not also count as 2022.
 * Years outside 1990–2100 are ignored.
 */
export function extractYearCandidates(text: string): number[] {
  const found = new Set<number>();
  let rest = text;

  rest = rest.replace(RANGE_REGEX, (match, startRaw: string, endRaw: string) => {
    const start = parseInt(startRaw, 10);
    const ending = rangeEndingYear(start, endRaw);
    if (ending !== null) {
      if (isPlausibleYear(ending)) found.add(ending);
      return " ";
    }
    // Not a financial-year pair: let the single-year pass see both halves
    return match.replace(/[-_/]/, " ");
  });

  rest = rest.replace(COMPACT_REGEX, (match, startRaw: string, endRaw: string) => {
    const start = expandTwoDigitYear(parseInt(startRaw, 10));
    const ending = rangeEndingYear(start, endRaw);
    if (ending === null) return match;
    if (isPlausibleYear(ending)) found.add(ending);
    return " ";
  });

  for (const match of rest.matchAll(SINGLE_REGEX)) {
    const year = parseInt(match[1], 10);
    if (isPlausibleYear(year)) found.add(year);
  }

  return Array.from(found).sort((a, b) => a - b);
}

/**
 * Parse a stored year label. Returns null unless the label names exactly one
 * plausible financial year.
 */
export function parseFinancialYear(label: string): number | null {
  const trimmed = label.trim();
  if (!trimmed) return null;
  const candidates = extractYearCandidates(trimmed);
  return candidates.length === 1 ? candidates[0] : null;
}
