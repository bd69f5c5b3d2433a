import * as fs from "fs/promises";
import * as path from "path";
import {
  missingYearsSchema,
  progressSnapshotEnvelopeSchema,
  universityCoverageSchema,
  type ProgressSnapshot,
  type UniversityCoverage,
} from "@shared/schema";
import { logWarning } from "../log";
import { CorruptProgressStoreError, errorMessage } from "./errors";
import type { GapSet } from "./gap-analyzer";
import type { Inventory } from "./inventory";

export const SNAPSHOT_VERSION = 1;

const SNAPSHOT_FILE_REGEX = /^progress-(\d{6,})-.+\.json$/;

export interface SnapshotInput {
  inventory: Inventory;
  gapSet: GapSet;
  plannedTasks?: number;
  acquiredDocuments?: number;
  timestamp?: Date;
}

export interface RecordedSnapshot {
  snapshot: ProgressSnapshot;
  path: string;
}

export function buildSnapshot(input: SnapshotInput, iteration: number): ProgressSnapshot {
  const universities: Record<string, UniversityCoverage> = {};
  input.inventory.forEach((entry) => {
    universities[entry.university.canonicalName] = {
      years: [...entry.years],
      minYear: entry.years.length > 0 ? entry.years[0] : null,
      maxYear: entry.years.length > 0 ? entry.years[entry.years.length - 1] : null,
      fileCount: entry.documentCount,
      unknownYearFiles: entry.unknownYearDocuments,
    };
  });

  const missing: Record<string, number[]> = {};
  input.gapSet.universities.forEach((gaps) => {
    missing[gaps.university.canonicalName] = [...gaps.missingYears];
  });

  return {
    version: SNAPSHOT_VERSION,
    timestamp: (input.timestamp ?? new Date()).toISOString(),
    iteration,
    referenceYear: input.gapSet.referenceYear,
    window: { ...input.gapSet.range },
    universities,
    missing,
    unstarted: input.gapSet.unstarted.map((u) => u.canonicalName),
    plannedTasks: input.plannedTasks ?? 0,
    acquiredDocuments: input.acquiredDocuments ?? 0,
  };
}

function snapshotFilename(iteration: number, timestamp: string): string {
  return `progress-${String(iteration).padStart(6, "0")}-${timestamp.replace(/[:.]/g, "-")}.json`;
}

function iterationOf(filename: string): number | null {
  const match = filename.match(SNAPSHOT_FILE_REGEX);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Append-only history of planning cycles. Snapshots are for people and
 * resumption checks; planning never reads them.
 */
export class ProgressTracker {
  constructor(readonly dir: string) {}

  /** Snapshot filenames, oldest first. */
  async listSnapshots(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return names
      .filter((name) => iterationOf(name) !== null)
      .sort((a, b) => (iterationOf(a) ?? 0) - (iterationOf(b) ?? 0) || (a < b ? -1 : a > b ? 1 : 0));
  }

  async record(input: SnapshotInput): Promise<RecordedSnapshot> {
    await fs.mkdir(this.dir, { recursive: true });
    const existing = await this.listSnapshots();
    const last = existing.length > 0 ? iterationOf(existing[existing.length - 1]) ?? 0 : 0;

    const snapshot = buildSnapshot(input, last + 1);
    const filePath = path.join(this.dir, snapshotFilename(snapshot.iteration, snapshot.timestamp));
    // "wx": never overwrite an earlier snapshot
    await fs.writeFile(filePath, JSON.stringify(snapshot, null, 2), { encoding: "utf-8", flag: "wx" });
    return { snapshot, path: filePath };
  }

  /**
   * Newest snapshot, or null when there is none or it cannot be read.
   * Invalid per-university entries are dropped instead of failing the load.
   */
  async loadLatest(): Promise<ProgressSnapshot | null> {
    let filePath = this.dir;
    try {
      const names = await this.listSnapshots();
      if (names.length === 0) return null;
      filePath = path.join(this.dir, names[names.length - 1]);
      return await readSnapshot(filePath);
    } catch (err) {
      const corrupt =
        err instanceof CorruptProgressStoreError ? err : new CorruptProgressStoreError(filePath, errorMessage(err), err);
      logWarning(`${corrupt.message}; continuing without it`, "progress");
      return null;
    }
  }
}

async function readSnapshot(filePath: string): Promise<ProgressSnapshot> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, "utf-8"));
  } catch (err) {
    throw new CorruptProgressStoreError(filePath, errorMessage(err), err);
  }

  const envelope = progressSnapshotEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new CorruptProgressStoreError(filePath, envelope.error.issues[0]?.message ?? "invalid snapshot");
  }

  const universities: Record<string, UniversityCoverage> = {};
  for (const [name, value] of Object.entries(envelope.data.universities)) {
    const entry = universityCoverageSchema.safeParse(value);
    if (entry.success) {
      universities[name] = entry.data;
    } else {
      logWarning(`Dropping unreadable coverage for ${name} in ${filePath}`, "progress");
    }
  }

  const missing: Record<string, number[]> = {};
  for (const [name, value] of Object.entries(envelope.data.missing)) {
    const years = missingYearsSchema.safeParse(value);
    if (years.success) {
      missing[name] = years.data;
    } else {
      logWarning(`Dropping unreadable gap list for ${name} in ${filePath}`, "progress");
    }
  }

  return { ...envelope.data, universities, missing };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export interface SnapshotDiff {
  previousIteration: number;
  /** Years that were missing in the previous snapshot and are now covered. */
  newlyCovered: { university: string; years: number[] }[];
  /** Years missing now that the previous snapshot did not list. */
  newlyMissing: { university: string; years: number[] }[];
}

export function compareWithSnapshot(previous: ProgressSnapshot, gapSet: GapSet): SnapshotDiff {
  const newlyCovered: SnapshotDiff["newlyCovered"] = [];
  const newlyMissing: SnapshotDiff["newlyMissing"] = [];

  gapSet.universities.forEach((gaps) => {
    const name = gaps.university.canonicalName;
    const before = previous.missing[name] ?? [];
    const now = new Set(gaps.missingYears);
    const known = new Set(gaps.knownYears);
    const beforeSet = new Set(before);

    const covered = before.filter((year) => !now.has(year) && known.has(year)).sort((a, b) => b - a);
    const opened = gaps.missingYears.filter((year) => !beforeSet.has(year));
    if (covered.length > 0) newlyCovered.push({ university: name, years: covered });
    if (opened.length > 0 && name in previous.missing) newlyMissing.push({ university: name, years: opened });
  });

  return { previousIteration: previous.iteration, newlyCovered, newlyMissing };
}
