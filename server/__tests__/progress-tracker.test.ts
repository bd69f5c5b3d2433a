import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { computeGaps } from "../collection/gap-analyzer";
import { buildInventory } from "../collection/inventory";
import { buildSnapshot, compareWithSnapshot, ProgressTracker, type SnapshotInput } from "../collection/progress-tracker";
import { record, testResolver } from "./fixtures";

const resolver = testResolver();

function snapshotInput(coverage: Record<string, number[]>, timestamp: Date): SnapshotInput {
  const records = Object.entries(coverage).flatMap(([name, years]) => years.map((year) => record(name, year)));
  const { inventory } = buildInventory({ records }, resolver);
  const gapSet = computeGaps(inventory, { lookbackYears: 3, lookaheadYears: 2 }, 2022);
  return { inventory, gapSet, plannedTasks: 4, acquiredDocuments: 1, timestamp };
}

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "progress-"));
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

describe("buildSnapshot", () => {
  it("summarizes coverage and outstanding gaps per university", () => {
    const snapshot = buildSnapshot(
      snapshotInput({ "University of Bath": [2020, 2022] }, new Date("2024-03-01T12:00:00.000Z")),
      7,
    );
    expect(snapshot).toEqual({
      version: 1,
      timestamp: "2024-03-01T12:00:00.000Z",
      iteration: 7,
      referenceYear: 2022,
      window: { start: 2019, end: 2024 },
      universities: {
        "University of Bath": { years: [2020, 2022], minYear: 2020, maxYear: 2022, fileCount: 2, unknownYearFiles: 0 },
      },
      missing: { "University of Bath": [2024, 2023, 2021, 2019] },
      unstarted: [],
      plannedTasks: 4,
      acquiredDocuments: 1,
    });
  });
});

describe("ProgressTracker", () => {
  it("appends numbered snapshots without overwriting earlier ones", async () => {
    const tracker = new ProgressTracker(dir);
    const first = await tracker.record(snapshotInput({ "University of Bath": [2021] }, new Date("2024-01-01T00:00:00.000Z")));
    const second = await tracker.record(snapshotInput({ "University of Bath": [2021, 2022] }, new Date("2024-01-02T00:00:00.000Z")));

    expect(first.snapshot.iteration).toBe(1);
    expect(second.snapshot.iteration).toBe(2);
    expect(path.basename(first.path)).toBe("progress-000001-2024-01-01T00-00-00-000Z.json");
    expect(await tracker.listSnapshots()).toEqual([
      "progress-000001-2024-01-01T00-00-00-000Z.json",
      "progress-000002-2024-01-02T00-00-00-000Z.json",
    ]);

    const original = JSON.parse(await fs.readFile(first.path, "utf-8"));
    expect(original.universities["University of Bath"].years).toEqual([2021]);
  });

  it("loads the newest snapshot", async () => {
    const tracker = new ProgressTracker(dir);
    await tracker.record(snapshotInput({ "University of Bath": [2021] }, new Date("2024-01-01T00:00:00.000Z")));
    await tracker.record(snapshotInput({ "University of Bath": [2021, 2022] }, new Date("2024-01-02T00:00:00.000Z")));

    const latest = await tracker.loadLatest();
    expect(latest?.iteration).toBe(2);
    expect(latest?.universities["University of Bath"].years).toEqual([2021, 2022]);
  });

  it("returns null when no snapshot exists", async () => {
    expect(await new ProgressTracker(path.join(dir, "missing")).loadLatest()).toBeNull();
    expect(await new ProgressTracker(dir).listSnapshots()).toEqual([]);
  });

  it("treats an unreadable snapshot as absent", async () => {
    await fs.writeFile(path.join(dir, "progress-000003-broken.json"), "{ not json");
    expect(await new ProgressTracker(dir).loadLatest()).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("treats a progress path that is not a directory as absent", async () => {
    const notADir = path.join(dir, "progress");
    await fs.writeFile(notADir, "");
    expect(await new ProgressTracker(notADir).loadLatest()).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("keeps numbering after a corrupt snapshot", async () => {
    await fs.writeFile(path.join(dir, "progress-000003-broken.json"), "{ not json");
    const recorded = await new ProgressTracker(dir).record(
      snapshotInput({ "University of Bath": [2021] }, new Date("2024-01-01T00:00:00.000Z")),
    );
    expect(recorded.snapshot.iteration).toBe(4);
  });

  it("drops unreadable university entries and ignores unknown fields", async () => {
    const raw = {
      version: 2,
      timestamp: "2024-01-01T00:00:00.000Z",
      iteration: 1,
      referenceYear: 2022,
      window: { start: 2019, end: 2024 },
      universities: {
        "University of Bath": { years: [2021], minYear: 2021, maxYear: 2021, fileCount: 1 },
        "University of Oxford": { years: "lots" },
      },
      missing: { "University of Bath": [2024, 2023], "University of Oxford": "none" },
      addedInALaterVersion: true,
    };
    await fs.writeFile(path.join(dir, "progress-000001-2024.json"), JSON.stringify(raw));

    const latest = await new ProgressTracker(dir).loadLatest();
    expect(latest).toEqual({
      version: 2,
      timestamp: "2024-01-01T00:00:00.000Z",
      iteration: 1,
      referenceYear: 2022,
      window: { start: 2019, end: 2024 },
      universities: {
        "University of Bath": { years: [2021], minYear: 2021, maxYear: 2021, fileCount: 1, unknownYearFiles: 0 },
      },
      missing: { "University of Bath": [2024, 2023] },
      unstarted: [],
      plannedTasks: 0,
      acquiredDocuments: 0,
    });
    expect(console.warn).toHaveBeenCalledTimes(2);
  });
});

describe("compareWithSnapshot", () => {
  it("reports years covered since the previous snapshot", () => {
    const previous = buildSnapshot(snapshotInput({ "University of Bath": [2021] }, new Date()), 1);
    const now = snapshotInput({ "University of Bath": [2021, 2023], "University of Oxford": [2022] }, new Date());

    expect(compareWithSnapshot(previous, now.gapSet)).toEqual({
      previousIteration: 1,
      newlyCovered: [{ university: "University of Bath", years: [2023] }],
      newlyMissing: [],
    });
  });

  it("reports gaps that opened when the window moved", () => {
    const previous = buildSnapshot(snapshotInput({ "University of Bath": [2021] }, new Date()), 3);
    const records = [record("University of Bath", 2021)];
    const { inventory } = buildInventory({ records }, resolver);
    const later = computeGaps(inventory, { lookbackYears: 3, lookaheadYears: 2 }, 2023);

    expect(compareWithSnapshot(previous, later)).toEqual({
      previousIteration: 3,
      newlyCovered: [],
      newlyMissing: [{ university: "University of Bath", years: [2025] }],
    });
  });
});
