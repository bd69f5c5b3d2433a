import * as path from "path";
import { extractYearCandidates, UNKNOWN_YEAR, type UnknownYear } from "./financial-year";
import type { IdentityMatch, IdentityResolver } from "./identity";

/**
 * Result of reading `<UniversityName>_<optional year>_<document slug>.<ext>`.
 */
export type FilenameParse =
  | { kind: "parsed"; filename: string; match: IdentityMatch; year: number | UnknownYear }
  | { kind: "ambiguous-year"; filename: string; match: IdentityMatch; candidateYears: number[] }
  | { kind: "unparseable"; filename: string; rawName: string };

/** University names never run past this many underscore-separated parts. */
const MAX_NAME_PARTS = 8;

/** Slug words that mark the end of the university name. */
const DOCUMENT_KEYWORDS = ["annual", "report", "financial", "statements", "accounts", "document", "final"];

/**
 * Best-effort raw name for log messages when nothing in the reference table
 * matched: leading parts up to the first year or document keyword.
 */
export function guessUniversityName(stem: string): string {
  const parts = stem.split("_").filter(Boolean);
  const nameParts: string[] = [];
  for (const part of parts) {
    if (/^\d{4}/.test(part)) break;
    const lower = part.toLowerCase();
    if (DOCUMENT_KEYWORDS.some((keyword) => lower.includes(keyword))) break;
    if (part.length > 30 || part.split("-").length > 3) break;
    nameParts.push(part);
    if (nameParts.length >= 4) break;
  }
  return nameParts.join(" ") || stem;
}

function longestPrefixMatch(parts: string[], identity: IdentityResolver): IdentityMatch | null {
  let limit = Math.min(parts.length, MAX_NAME_PARTS);
  const firstYearPart = parts.findIndex((part) => /^\d{4}/.test(part));
  if (firstYearPart >= 0) limit = Math.min(limit, firstYearPart);

  for (let n = limit; n >= 1; n--) {
    const match = identity.match(parts.slice(0, n).join(" "));
    if (match) return match;
  }
  return null;
}

export function parseDocumentFilename(filename: string, identity: IdentityResolver): FilenameParse {
  const base = path.basename(filename);
  const stem = base.slice(0, base.length - path.extname(base).length);

  const match =
    longestPrefixMatch(stem.split("_").filter(Boolean), identity) ??
    longestPrefixMatch(stem.split(/[_\-\s]+/).filter(Boolean), identity);

  if (!match) {
    return { kind: "unparseable", filename, rawName: guessUniversityName(stem) };
  }

  // Reference names carry no digits, so every year token belongs to the slug
  const years = extractYearCandidates(stem);
  if (years.length === 0) {
    return { kind: "parsed", filename, match, year: UNKNOWN_YEAR };
  }
  if (years.length > 1) {
    return { kind: "ambiguous-year", filename, match, candidateYears: years };
  }
  return { kind: "parsed", filename, match, year: years[0] };
}
