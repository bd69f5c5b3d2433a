import * as path from "path";
import pLimit from "p-limit";
import type { FinancialDocument, ProgressSnapshot } from "@shared/schema";
import { log, logWarning } from "../log";
import { createStorage, type IRecordStore } from "../storage";
import {
  isOwnedBy,
  type DocumentFetcher,
  type ExtractionResult,
  type FetchedDocument,
  type TextExtractor,
} from "./collaborators";
import { CommandDocumentFetcher, CommandTextExtractor } from "./command-tools";
import type { CollectionConfig } from "./config";
import { errorMessage, InvalidConfigError, MalformedRecordError, RecordStoreUnavailableError } from "./errors";
import { scanExtractedText } from "./extracted-files";
import { extractYearCandidates, formatFinancialYear } from "./financial-year";
import { computeGaps, totalGapCount, type GapSet } from "./gap-analyzer";
import { IdentityResolver, loadReferenceTable } from "./identity";
import { buildInventory, type Inventory, type InventoryWarning } from "./inventory";
import { compareWithSnapshot, ProgressTracker, type SnapshotDiff } from "./progress-tracker";
import { planQueries, taskId, type BatchLimit, type SearchTask } from "./query-planner";

export interface Analysis {
  inventory: Inventory;
  gapSet: GapSet;
  warnings: InventoryWarning[];
}

export interface Collaborators {
  fetcher: DocumentFetcher | null;
  extractor: TextExtractor | null;
}

export interface CycleOptions extends Partial<Collaborators> {
  dryRun?: boolean;
  batch?: Partial<BatchLimit>;
}

export interface AcquiredDocument {
  task: SearchTask;
  record: FinancialDocument;
  document: FetchedDocument;
}

export interface CycleReport {
  dryRun: boolean;
  tasks: SearchTask[];
  before: GapSet;
  /** Gap state after acquisitions; equal to `before` in dry-run. */
  after: GapSet;
  placeholdersAdded: number;
  acquired: AcquiredDocument[];
  /** Task ids whose fetch threw; the gap stays open. */
  failedTasks: string[];
  rejectedDocuments: number;
  extracted: number;
  alreadyExtracted: number;
  failedExtractions: number;
  snapshotPath: string | null;
  /** Change since the previous snapshot, when one could be read. */
  diff: SnapshotDiff | null;
}

export type StopReason = "complete" | "stalled" | "max-iterations";

export interface RunReport {
  cycles: CycleReport[];
  stopReason: StopReason;
}

export interface CoordinatorDeps {
  config: CollectionConfig;
  identity: IdentityResolver;
  store: IRecordStore;
  tracker: ProgressTracker;
  /** Filenames of extracted documents; defaults to scanning config.extractedDir. */
  scanFilenames?: () => string[];
}

function folderName(name: string): string {
  return name.replace(/[^A-Za-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
}

function singleYear(text: string): number | null {
  const years = extractYearCandidates(text);
  return years.length === 1 ? years[0] : null;
}

/**
 * Year a fetched document belongs to. A single year in the saved filename
 * wins; gap tasks otherwise keep the year they searched for. Only bootstrap
 * tasks look at the URL, where upload dates make years unreliable.
 */
function documentYear(task: SearchTask, document: FetchedDocument): number | null {
  const fromFilename = singleYear(path.basename(document.localPath));
  if (fromFilename !== null) return fromFilename;
  if (task.kind === "gap") return task.year;
  return singleYear(document.sourceUrl);
}

export class CollectionCoordinator {
  readonly config: CollectionConfig;
  readonly identity: IdentityResolver;
  readonly store: IRecordStore;
  readonly tracker: ProgressTracker;
  private readonly scanFilenames: () => string[];

  constructor(deps: CoordinatorDeps) {
    this.config = deps.config;
    this.identity = deps.identity;
    this.store = deps.store;
    this.tracker = deps.tracker;
    this.scanFilenames = deps.scanFilenames ?? (() => scanExtractedText(deps.config.extractedDir));
  }

  /** Read-only: inventory and gaps re-derived from the record store and the extracted files. */
  async analyze(): Promise<Analysis> {
    let records: FinancialDocument[];
    try {
      records = await this.store.listRecords();
    } catch (err) {
      if (err instanceof RecordStoreUnavailableError) throw err;
      throw new RecordStoreUnavailableError(errorMessage(err), err);
    }

    const { inventory, warnings } = buildInventory({ records, filenames: this.scanFilenames() }, this.identity);
    for (const warning of warnings) {
      logWarning(`${warning.code} ${warning.source}: ${warning.message}`, "inventory");
    }

    const gapSet = computeGaps(
      inventory,
      { lookbackYears: this.config.lookbackYears, lookaheadYears: this.config.lookaheadYears },
      this.config.referenceYear,
      { universe: this.identity.universities },
    );
    return { inventory, gapSet, warnings };
  }

  batchLimit(overrides: Partial<BatchLimit> = {}): BatchLimit {
    return {
      universitiesPerBatch: overrides.universitiesPerBatch ?? this.config.universitiesPerBatch,
      yearsPerUniversity: overrides.yearsPerUniversity ?? this.config.yearsPerUniversity,
      bootstrapPerBatch: overrides.bootstrapPerBatch ?? this.config.bootstrapPerBatch,
    };
  }

  planFrom(gapSet: GapSet, batch: Partial<BatchLimit> = {}): SearchTask[] {
    return planQueries(gapSet, this.batchLimit(batch), { documentTypeHint: this.config.documentTypeHint });
  }

  async plan(batch: Partial<BatchLimit> = {}): Promise<SearchTask[]> {
    const { gapSet } = await this.analyze();
    return this.planFrom(gapSet, batch);
  }

  /**
   * One cycle: plan, record placeholders, fetch everything, record what was
   * acquired, extract everything, re-analyze and snapshot. Phases never
   * interleave, so the store is not read while it is being written.
   */
  async runCycle(options: CycleOptions = {}): Promise<CycleReport> {
    const dryRun = options.dryRun ?? false;
    const before = await this.analyze();
    const tasks = this.planFrom(before.gapSet, options.batch);
    const previous = await this.tracker.loadLatest();
    const diffAgainst = (snapshot: ProgressSnapshot | null, gapSet: GapSet) =>
      snapshot ? compareWithSnapshot(snapshot, gapSet) : null;

    const report: CycleReport = {
      dryRun,
      tasks,
      before: before.gapSet,
      after: before.gapSet,
      placeholdersAdded: 0,
      acquired: [],
      failedTasks: [],
      rejectedDocuments: 0,
      extracted: 0,
      alreadyExtracted: 0,
      failedExtractions: 0,
      snapshotPath: null,
      diff: diffAgainst(previous, before.gapSet),
    };

    if (dryRun) return report;

    if (tasks.length > 0) {
      const fetcher = options.fetcher ?? null;
      if (!fetcher) {
        throw new InvalidConfigError("No document fetcher configured; set FETCHER_COMMAND or use a dry run");
      }

      report.placeholdersAdded = await this.store.ensurePlaceholders(
        tasks.flatMap((task) =>
          task.kind === "gap"
            ? [{ university: task.university.canonicalName, year: task.year, yearLabel: formatFinancialYear(task.year) }]
            : [],
        ),
      );

      const fetched = await this.fetchAll(fetcher, tasks, report);
      report.acquired = await this.recordAcquisitions(fetched, report);

      const extractor = options.extractor ?? null;
      if (extractor) {
        await this.extractAll(extractor, report);
      } else if (report.acquired.length > 0) {
        logWarning("No text extractor configured; acquired documents are left unprocessed", "coordinator");
      }
    }

    const after = await this.analyze();
    report.after = after.gapSet;
    report.diff = diffAgainst(previous, after.gapSet);
    let cycleLabel = "Cycle";
    try {
      const recorded = await this.tracker.record({
        inventory: after.inventory,
        gapSet: after.gapSet,
        plannedTasks: tasks.length,
        acquiredDocuments: report.acquired.length,
      });
      report.snapshotPath = recorded.path;
      cycleLabel = `Cycle ${recorded.snapshot.iteration}`;
    } catch (err) {
      logWarning(`Could not write a progress snapshot to ${this.tracker.dir}: ${errorMessage(err)}`, "progress");
    }

    log(
      `${cycleLabel}: ${tasks.length} tasks, ${report.acquired.length} acquired, ` +
        `${totalGapCount(before.gapSet)} → ${totalGapCount(after.gapSet)} gaps`,
      "coordinator",
    );
    return report;
  }

  /** Repeats cycles until nothing is left to plan, a cycle acquires nothing, or the iteration limit. */
  async run(options: CycleOptions & { maxIterations?: number } = {}): Promise<RunReport> {
    const maxIterations = options.maxIterations ?? this.config.maxIterations;
    const cycles: CycleReport[] = [];

    for (let i = 0; i < maxIterations; i++) {
      const report = await this.runCycle(options);
      cycles.push(report);
      if (report.tasks.length === 0) return { cycles, stopReason: "complete" };
      if (report.dryRun || report.acquired.length === 0) return { cycles, stopReason: "stalled" };
    }
    return { cycles, stopReason: "max-iterations" };
  }

  private async fetchAll(
    fetcher: DocumentFetcher,
    tasks: SearchTask[],
    report: CycleReport,
  ): Promise<{ task: SearchTask; documents: FetchedDocument[] }[]> {
    const limit = pLimit(this.config.fetchConcurrency);
    return Promise.all(
      tasks.map((task) =>
        limit(async () => {
          try {
            const documents = await fetcher.fetch({
              task,
              outputDir: path.join(this.config.downloadsDir, folderName(task.university.canonicalName)),
              limit: this.config.resultsPerQuery,
            });
            if (documents.length === 0) log(`No results for ${task.query}`, "fetch");
            return { task, documents };
          } catch (err) {
            logWarning(`Fetch failed for ${taskId(task)}: ${errorMessage(err)}`, "fetch");
            report.failedTasks.push(taskId(task));
            return { task, documents: [] };
          }
        }),
      ),
    );
  }

  private async recordAcquisitions(
    fetched: { task: SearchTask; documents: FetchedDocument[] }[],
    report: CycleReport,
  ): Promise<AcquiredDocument[]> {
    const acquired: AcquiredDocument[] = [];
    const claimed = new Set<string>();

    for (const { task, documents } of fetched) {
      for (const document of documents) {
        if (!isOwnedBy(document.sourceUrl, task.domain)) {
          logWarning(
            `Rejected ${document.sourceUrl} for ${task.university.canonicalName}: not served from ${task.domain ?? "an ac.uk host"}`,
            "fetch",
          );
          report.rejectedDocuments++;
          continue;
        }

        const year = documentYear(task, document);
        const key = `${task.university.key}:${year ?? document.localPath}`;
        if (claimed.has(key)) continue;
        claimed.add(key);

        try {
          const { record, written } = await this.store.recordAcquisition({
            university: task.university.canonicalName,
            year,
            yearLabel: year === null ? null : formatFinancialYear(year),
            sourceUrl: document.sourceUrl,
            documentPath: document.localPath,
            acquiredAt: document.retrievedAt,
          });
          if (written) acquired.push({ task, record, document });
          else log(`Already recorded ${document.sourceUrl}`, "coordinator");
        } catch (err) {
          if (!(err instanceof MalformedRecordError)) throw err;
          logWarning(err.message, "coordinator");
        }
      }
    }
    return acquired;
  }

  private async extractAll(extractor: TextExtractor, report: CycleReport): Promise<void> {
    const limit = pLimit(this.config.extractConcurrency);
    await Promise.all(
      report.acquired.map(({ record, document }) =>
        limit(async () => {
          let result: ExtractionResult;
          try {
            result = await extractor.extract(document.localPath);
          } catch (err) {
            logWarning(`Extraction failed for ${document.localPath}: ${errorMessage(err)}`, "extract");
            report.failedExtractions++;
            return;
          }
          if (result.status === "already-processed") report.alreadyExtracted++;
          else report.extracted++;
          await this.store.attachExtraction(record.id, {
            textPath: result.textPath,
            structuredPath: result.structuredPath,
            pageCount: result.pageCount,
          });
        }),
      ),
    );
  }
}

export function createCollaborators(config: CollectionConfig): Collaborators {
  return {
    fetcher: config.fetcherCommand ? new CommandDocumentFetcher(config.fetcherCommand) : null,
    extractor: config.extractorCommand ? new CommandTextExtractor(config.extractorCommand) : null,
  };
}

export function createDefaultCoordinator(config: CollectionConfig, store: IRecordStore = createStorage()) {
  const identity = new IdentityResolver(loadReferenceTable(config.referenceDataDir), {
    minConfidence: config.minIdentityConfidence,
  });
  return new CollectionCoordinator({
    config,
    identity,
    store,
    tracker: new ProgressTracker(config.progressDir),
  });
}
