import type { FinancialDocument } from "@shared/schema";
import { isPlausibleYear, parseFinancialYear, UNKNOWN_YEAR, type UnknownYear } from "./financial-year";
import { parseDocumentFilename } from "./filename-parser";
import { compareNames, type CanonicalUniversityKey, type IdentityResolver, type University } from "./identity";
import { MalformedRecordError, UnresolvedIdentityError, type CollectionErrorCode } from "./errors";

export type InventoryRecord = Pick<FinancialDocument, "university" | "year" | "yearLabel" | "documentPath">;

export interface InventoryInput {
  /** Rows from the record store. */
  records?: readonly InventoryRecord[];
  /** Names (or paths) of already-extracted documents. */
  filenames?: readonly string[];
}

export interface InventoryEntry {
  university: University;
  /** Distinct ending years with a document, ascending. */
  years: number[];
  documentCount: number;
  /** Documents whose year is unknown or ambiguous; they never affect gaps. */
  unknownYearDocuments: number;
  sources: string[];
}

/** Sorted by canonical name; iteration order is part of the contract. */
export type Inventory = ReadonlyMap<CanonicalUniversityKey, InventoryEntry>;

export interface InventoryWarning {
  code: CollectionErrorCode | "AMBIGUOUS_YEAR" | "DUPLICATE_RECORD";
  source: string;
  message: string;
}

export interface InventoryBuildResult {
  inventory: Inventory;
  warnings: InventoryWarning[];
}

interface MutableEntry {
  university: University;
  years: Set<number>;
  documentCount: number;
  unknownYearDocuments: number;
  sources: Set<string>;
}

function describeRecord(record: InventoryRecord): string {
  return `record(${record.university}, ${record.year ?? record.yearLabel ?? "no year"})`;
}

function recordYear(record: InventoryRecord): { year: number | UnknownYear; error?: MalformedRecordError } {
  if (record.year !== null) {
    if (isPlausibleYear(record.year)) return { year: record.year };
    return {
      year: UNKNOWN_YEAR,
      error: new MalformedRecordError(describeRecord(record), `year ${record.year} is outside the supported range`),
    };
  }
  if (record.yearLabel && record.yearLabel.trim()) {
    const parsed = parseFinancialYear(record.yearLabel);
    if (parsed !== null) return { year: parsed };
    return {
      year: UNKNOWN_YEAR,
      error: new MalformedRecordError(describeRecord(record), `cannot read a financial year from "${record.yearLabel}"`),
    };
  }
  return { year: UNKNOWN_YEAR };
}

/**
 * Per-university view of which financial years already have a document.
 * Pure: logging is left to the caller through the returned warnings.
 */
export function buildInventory(input: InventoryInput, identity: IdentityResolver): InventoryBuildResult {
  const entries = new Map<CanonicalUniversityKey, MutableEntry>();
  const warnings: InventoryWarning[] = [];
  const recordYearsSeen = new Set<string>();

  const entryFor = (university: University): MutableEntry => {
    let entry = entries.get(university.key);
    if (!entry) {
      entry = { university, years: new Set(), documentCount: 0, unknownYearDocuments: 0, sources: new Set() };
      entries.set(university.key, entry);
    }
    return entry;
  };

  const warn = (source: string, error: UnresolvedIdentityError | MalformedRecordError) => {
    warnings.push({ code: error.code, source, message: error.message });
  };

  for (const record of input.records ?? []) {
    // Placeholders describe planned work, not coverage
    if (!record.documentPath || !record.documentPath.trim()) continue;

    const source = record.documentPath;
    const match = identity.match(record.university);
    if (!match) {
      warn(source, new UnresolvedIdentityError(record.university));
      continue;
    }

    const entry = entryFor(match.university);
    entry.documentCount++;
    entry.sources.add(source);

    const { year, error } = recordYear(record);
    if (error) warn(source, error);
    if (year === UNKNOWN_YEAR) {
      entry.unknownYearDocuments++;
      continue;
    }

    const pairKey = `${match.university.key}:${year}`;
    if (recordYearsSeen.has(pairKey)) {
      warnings.push({
        code: "DUPLICATE_RECORD",
        source,
        message: `More than one document recorded for ${match.university.canonicalName} ${year}`,
      });
    }
    recordYearsSeen.add(pairKey);
    entry.years.add(year);
  }

  for (const filename of input.filenames ?? []) {
    const parsed = parseDocumentFilename(filename, identity);
    switch (parsed.kind) {
      case "unparseable":
        warn(filename, new UnresolvedIdentityError(parsed.rawName));
        break;
      case "ambiguous-year": {
        const entry = entryFor(parsed.match.university);
        entry.documentCount++;
        entry.unknownYearDocuments++;
        entry.sources.add(filename);
        warnings.push({
          code: "AMBIGUOUS_YEAR",
          source: filename,
          message: `Filename names several financial years (${parsed.candidateYears.join(", ")})`,
        });
        break;
      }
      case "parsed": {
        const entry = entryFor(parsed.match.university);
        entry.documentCount++;
        entry.sources.add(filename);
        if (parsed.year === UNKNOWN_YEAR) {
          entry.unknownYearDocuments++;
          warn(filename, new MalformedRecordError(filename, "no financial year in filename"));
        } else {
          entry.years.add(parsed.year);
        }
        break;
      }
    }
  }

  const inventory = new Map<CanonicalUniversityKey, InventoryEntry>();
  const sorted = Array.from(entries.values()).sort((a, b) =>
    compareNames(a.university.canonicalName, b.university.canonicalName),
  );
  for (const entry of sorted) {
    inventory.set(entry.university.key, {
      university: entry.university,
      years: Array.from(entry.years).sort((a, b) => a - b),
      documentCount: entry.documentCount,
      unknownYearDocuments: entry.unknownYearDocuments,
      sources: Array.from(entry.sources).sort(compareNames),
    });
  }

  return { inventory, warnings };
}

