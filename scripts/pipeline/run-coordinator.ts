/**
 * Collection coordinator: find missing financial statements and go get them.
 *
 * Each cycle re-derives coverage from the record store and the extracted text
 * directory, plans a bounded batch of domain-scoped search queries, hands them
 * to the configured fetcher and extractor, then writes a progress snapshot to
 * data/progress. Cycles repeat until the window is covered, a cycle acquires
 * nothing, or --max-iterations is reached.
 *
 *   tsx scripts/pipeline/run-coordinator.ts --dry-run
 *   tsx scripts/pipeline/run-coordinator.ts --unis-per-iteration 10 --lookback 7
 */

import { loadCollectionConfig, type CollectionConfig, type ConfigOverrides } from "../../server/collection/config";
import {
  createCollaborators,
  createDefaultCoordinator,
  type Collaborators,
  type CollectionCoordinator,
  type CycleReport,
} from "../../server/collection/coordinator";
import { errorMessage, InvalidConfigError, RecordStoreUnavailableError } from "../../server/collection/errors";
import { formatFinancialYear } from "../../server/collection/financial-year";
import { totalGapCount, type GapSet } from "../../server/collection/gap-analyzer";
import type { SnapshotDiff } from "../../server/collection/progress-tracker";
import type { SearchTask } from "../../server/collection/query-planner";

export interface CoordinatorCliOptions {
  dryRun: boolean;
  once: boolean;
  help: boolean;
  overrides: ConfigOverrides;
}

const VALUE_FLAGS = new Map<string, keyof CollectionConfig>([
  ["--unis-per-iteration", "universitiesPerBatch"],
  ["--years-per-university", "yearsPerUniversity"],
  ["--bootstrap", "bootstrapPerBatch"],
  ["--lookback", "lookbackYears"],
  ["--lookahead", "lookaheadYears"],
  ["--reference-year", "referenceYear"],
  ["--max-iterations", "maxIterations"],
  ["--extracted", "extractedDir"],
  ["--downloads", "downloadsDir"],
  ["--progress", "progressDir"],
  ["--hint", "documentTypeHint"],
]);

const USAGE = `Usage: run-coordinator [options]

  --dry-run                   Show coverage and the planned queries; fetch nothing
  --once                      Run a single collection cycle
  --unis-per-iteration <n>    Universities per batch (default 5)
  --years-per-university <n>  Missing years searched per university (default 3)
  --bootstrap <n>             First-document searches for unstarted universities (default 0)
  --lookback <n>              Years before the reference year (default 5)
  --lookahead <n>             Years after the reference year (default 2)
  --reference-year <yyyy>     Ending year the window is centred on (default: this year)
  --max-iterations <n>        Upper bound on cycles (default 10)
  --extracted <dir>           Extracted text directory
  --downloads <dir>           Download directory
  --progress <dir>            Progress snapshot directory
  --hint <text>               Document type hint used in queries
`;

/** Values are kept as strings; the config schema coerces and validates them. */
export function parseCoordinatorArgs(args: string[]): CoordinatorCliOptions {
  const options: CoordinatorCliOptions = { dryRun: false, once: false, help: false, overrides: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--dry-run") {
      options.dryRun = true;
    } else if (arg === "--once") {
      options.once = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else {
      const field = VALUE_FLAGS.get(arg);
      if (!field) throw new InvalidConfigError(`Unknown option ${arg}`);
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new InvalidConfigError(`Option ${arg} needs a value`);
      }
      options.overrides[field] = value;
      i++;
    }
  }

  return options;
}

export function summaryLines(gapSet: GapSet, referenceUniversities: number): string[] {
  const recentFrom = gapSet.referenceYear - 1;
  const all = Array.from(gapSet.universities.values());
  const withGaps = all.filter((u) => u.missingYears.length > 0);
  const recent = all.filter((u) => u.knownYears.some((year) => year >= recentFrom));

  const lines = [
    `  Window:                ${formatFinancialYear(gapSet.range.start)} to ${formatFinancialYear(gapSet.range.end)}`,
    `  Universities with data: ${all.length} / ${referenceUniversities}`,
    `  With recent data:      ${recent.length} (${formatFinancialYear(recentFrom)} or later)`,
    `  With gaps:             ${withGaps.length} (${totalGapCount(gapSet)} missing years)`,
    `  Unstarted:             ${gapSet.unstarted.length}`,
  ];

  const worst = [...withGaps]
    .sort(
      (a, b) =>
        b.missingYears.length - a.missingYears.length ||
        (a.university.canonicalName < b.university.canonicalName ? -1 : 1),
    )
    .slice(0, 10);
  if (worst.length > 0) {
    lines.push("", "  Most missing years:");
    for (const gaps of worst) {
      lines.push(
        `    ${gaps.university.canonicalName}: ${gaps.missingYears.length} missing (${gaps.missingYears.map(formatFinancialYear).join(", ")})`,
      );
    }
  }
  return lines;
}

export function planLines(tasks: SearchTask[]): string[] {
  if (tasks.length === 0) return ["  Nothing to search for: every university is covered for this window."];
  return tasks.map((task) => {
    const year = task.year === null ? "first document" : formatFinancialYear(task.year);
    return `  [${task.priority}] ${task.university.canonicalName} ${year} → ${task.query}`;
  });
}

export function diffLines(diff: SnapshotDiff | null): string[] {
  if (!diff) return [];
  const lines = [`  Since snapshot #${diff.previousIteration}:`];
  for (const { university, years } of diff.newlyCovered) {
    lines.push(`    + ${university}: ${years.map(formatFinancialYear).join(", ")}`);
  }
  for (const { university, years } of diff.newlyMissing) {
    lines.push(`    - ${university}: ${years.map(formatFinancialYear).join(", ")}`);
  }
  if (lines.length === 1) lines.push("    no change");
  return lines;
}

function cycleLines(report: CycleReport): string[] {
  const lines = [
    `  Tasks: ${report.tasks.length}, acquired: ${report.acquired.length}, failed fetches: ${report.failedTasks.length}, rejected: ${report.rejectedDocuments}`,
    `  Extracted: ${report.extracted} new, ${report.alreadyExtracted} already done, ${report.failedExtractions} failed`,
    `  Missing years: ${totalGapCount(report.before)} → ${totalGapCount(report.after)}`,
  ];
  if (report.snapshotPath) lines.push(`  Snapshot: ${report.snapshotPath}`);
  return lines;
}

export interface CoordinatorCliDeps {
  createCoordinator: (config: CollectionConfig) => CollectionCoordinator;
  createCollaborators: (config: CollectionConfig) => Collaborators;
}

const defaultDeps: CoordinatorCliDeps = {
  createCoordinator: (config) => createDefaultCoordinator(config),
  createCollaborators,
};

/** Returns the process exit code. */
export async function runCoordinator(
  options: CoordinatorCliOptions,
  env: NodeJS.ProcessEnv = process.env,
  deps: CoordinatorCliDeps = defaultDeps,
): Promise<number> {
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadCollectionConfig(env, options.overrides);
  const coordinator = deps.createCoordinator(config);

  console.log("\n=== University financial statements: coverage ===\n");

  if (options.dryRun) {
    const report = await coordinator.runCycle({ dryRun: true });
    summaryLines(report.before, coordinator.identity.universities.length).forEach((line) => console.log(line));
    console.log("\n  Planned queries (dry run):");
    planLines(report.tasks).forEach((line) => console.log(line));
    const diff = diffLines(report.diff);
    if (diff.length > 0) {
      console.log("");
      diff.forEach((line) => console.log(line));
    }
    return 0;
  }

  const collaborators = deps.createCollaborators(config);
  const cycles: CycleReport[] = [];
  if (options.once) {
    cycles.push(await coordinator.runCycle(collaborators));
  } else {
    const result = await coordinator.run(collaborators);
    cycles.push(...result.cycles);
    console.log(`  Stopped: ${result.stopReason} after ${result.cycles.length} cycle(s)`);
  }

  cycles.forEach((report, index) => {
    console.log(`\n  Cycle ${index + 1}:`);
    cycleLines(report).forEach((line) => console.log(line));
  });

  const last = cycles[cycles.length - 1];
  if (last) {
    console.log("");
    summaryLines(last.after, coordinator.identity.universities.length).forEach((line) => console.log(line));
  }
  return 0;
}

if (/(?:run-coordinator\.[cm]?[jt]s|gap-planner)$/.test(process.argv[1] ?? "")) {
  Promise.resolve()
    .then(() => runCoordinator(parseCoordinatorArgs(process.argv.slice(2))))
    .then((code) => process.exit(code))
    .catch((err) => {
      if (err instanceof RecordStoreUnavailableError || err instanceof InvalidConfigError) {
        console.error(`❌ ${errorMessage(err)}`);
      } else {
        console.error(err);
      }
      process.exit(1);
    });
}
