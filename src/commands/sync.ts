import { defineCommand } from "citty";
import * as p from "@clack/prompts";
import pc from "picocolors";
import {
  EmptyCatalogError,
  GroupNotFoundError,
  listGroups,
  loadCatalog,
  selectGroups,
} from "../lib/catalog.js";
import { cleanupStale, type CleanupResult } from "../lib/cleaner.js";
import { resolveConcurrency } from "../lib/concurrency.js";
import {
  DEFAULTS,
  getCatalogPath,
  getGitHubToken,
  getRootDir,
  loadSettings,
} from "../lib/config.js";
import { createGitOperations, type VcsOperations } from "../lib/git.js";
import { createGitHubProvider, type SourceControlProvider } from "../lib/github.js";
import { scanInventory } from "../lib/inventory.js";
import { FailureLedger } from "../lib/ledger.js";
import { computeDiff, countPlan } from "../lib/planner.js";
import { RemoteIndex } from "../lib/remote-index.js";
import {
  buildDiffReport,
  formatDiffReport,
  formatFailureLedger,
  formatProgressLine,
  formatStats,
  formatVerdict,
  type DiffReport,
} from "../lib/report.js";
import { collectFailures, retryFailures } from "../lib/retry.js";
import { createStats, runWaves } from "../lib/scheduler.js";
import { toUserPath } from "../lib/ui-utils.js";
import type {
  Catalog,
  DiffPlan,
  RepoMetadata,
  RunStats,
  SyncTask,
  TaskResult,
} from "../types/index.js";

export interface SyncOptions {
  root: string;
  catalogPath: string;
  concurrency: number;
  listLimit: number;
  /** Fuzzy group names; empty selects every group */
  groups: string[];
  dryRun: boolean;
}

export interface SyncDeps {
  provider: SourceControlProvider;
  vcs: VcsOperations;
}

export interface SyncSummary {
  plan: DiffPlan;
  stats: RunStats;
  ledger: FailureLedger;
  recovered: SyncTask[];
  cleanup: CleanupResult;
  /** null on a dry run */
  report: DiffReport | null;
}

/**
 * "Tools, web" → ["Tools", "web"]
 */
export function parseGroupList(input: string | undefined): string[] {
  if (!input) return [];
  return input
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function logResult(result: TaskResult, completed: number, total: number): void {
  const line = formatProgressLine(result, completed, total);
  switch (result.outcome.status) {
    case "success":
      p.log.success(line);
      break;
    case "failure":
      p.log.error(line);
      break;
    case "skipped":
      p.log.warn(line);
      break;
  }
}

/**
 * Every id the whole grouping document asks for, as far as the index knows
 */
function collectExpectedIds(catalog: Catalog, plan: DiffPlan, index: RemoteIndex): Set<string> {
  const expected = new Set<string>();

  for (const group of plan.groups) {
    for (const task of [...group.missing, ...group.toUpdate]) expected.add(task.id);
    for (const skipped of group.skipped) {
      if (skipped.id) expected.add(skipped.id);
    }
  }

  for (const group of catalog.groups) {
    for (const shortName of group.repos) {
      const id = index.lookup(shortName);
      if (id !== undefined) expected.add(id);
    }
  }

  return expected;
}

function planExpectedIds(plan: DiffPlan): string[] {
  return plan.groups.flatMap((group) => [
    ...group.missing.map((task) => task.id),
    ...group.toUpdate.map((task) => task.id),
    ...group.skipped.flatMap((skipped) => (skipped.id ? [skipped.id] : [])),
  ]);
}

async function fetchMetadata(
  provider: SourceControlProvider,
  ids: string[]
): Promise<Map<string, RepoMetadata | null>> {
  const metadata = new Map<string, RepoMetadata | null>();

  for (const id of ids) {
    try {
      metadata.set(id, await provider.getRepoMetadata(id));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      p.log.warn(`Could not fetch details for ${id}: ${message}`);
      metadata.set(id, null);
    }
  }

  return metadata;
}

/**
 * One full reconciliation run. Throws only for setup failures; everything
 * that goes wrong with a single repository lands in the ledger.
 */
export async function runSync(options: SyncOptions, deps: SyncDeps): Promise<SyncSummary> {
  const { provider, vcs } = deps;
  const { dryRun } = options;
  const stats = createStats();
  const ledger = new FailureLedger();

  if (dryRun) {
    p.log.warn("Dry run mode - no changes will be made");
  }

  // ─────────────────────────────────────────────────────────────────────────
  // GROUPS
  // ─────────────────────────────────────────────────────────────────────────
  const catalog = await loadCatalog(options.catalogPath);
  if (catalog.groups.length === 0) {
    throw new EmptyCatalogError(catalog.path);
  }

  p.log.message(listGroups(catalog).join("\n"));

  const selection = selectGroups(catalog, options.groups);
  for (const input of selection.unknown) {
    p.log.warn(`No group matches "${input}"`);
  }
  if (selection.groups.length === 0) {
    throw new GroupNotFoundError(selection.unknown);
  }
  if (options.groups.length > 0) {
    p.log.info(`Selected: ${selection.groups.map((group) => group.name).join(", ")}`);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PHASE 1: RESOLVE
  // ─────────────────────────────────────────────────────────────────────────
  p.log.step("Phase 1: Indexing remote repositories...");

  const index = new RemoteIndex(provider, options.listLimit);
  const indexed = await index.bulkResolve();
  p.log.info(`  ${indexed} remote repositories indexed`);
  for (const warning of index.warnings) {
    p.log.warn(`  ${warning}`);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PHASE 2: PLAN
  // ─────────────────────────────────────────────────────────────────────────
  p.log.step("Phase 2: Planning...");

  const plan = await computeDiff(selection.groups, {
    root: options.root,
    index,
    migrateLegacy: !dryRun,
  });
  index.seal();

  for (const group of plan.groups) {
    for (const repo of group.unresolvable) {
      ledger.append({
        shortName: repo.shortName,
        group: group.group.name,
        category: "remote-unresolvable",
        message: repo.reason,
        attempt: 1,
      });
      p.log.warn(`  ? ${repo.shortName} (${group.group.name}): ${repo.reason}`);
    }

    for (const migration of group.migrations) {
      if (migration.error) {
        ledger.append({
          shortName: migration.shortName,
          group: group.group.name,
          category: "legacy-move",
          message: migration.error,
          attempt: 1,
        });
        p.log.warn(`  ✗ ${migration.shortName}: could not move ${toUserPath(migration.from)}`);
      } else if (migration.moved) {
        p.log.info(`  → ${migration.shortName} moved to ${toUserPath(migration.to)}`);
      } else {
        p.log.info(`  → ${migration.shortName} (would move to ${toUserPath(migration.to)})`);
      }
    }

    for (const skipped of group.skipped) {
      p.log.warn(`  ○ ${skipped.shortName} (${group.group.name}): ${skipped.reason}`);
    }
  }

  const counts = countPlan(plan);
  p.log.info(
    `  ${counts.missing} to clone, ${counts.toUpdate} to update, ` +
      `${counts.skipped} skipped, ${counts.unresolvable} unresolvable`
  );

  const groupDirs = plan.groups.map((group) => group.dir);
  const inventory = await scanInventory(groupDirs, index);
  p.log.info(`  ${inventory.records.length} local repositories found`);

  const expected = collectExpectedIds(catalog, plan, index);

  if (dryRun) {
    for (const task of plan.tasks) {
      const symbol = task.kind === "clone" ? "+" : "↻";
      p.log.info(`  ${symbol} ${task.id} (${task.group}) (would ${task.kind})`);
    }

    p.log.step("Cleanup preview...");
    const cleanup = await cleanupStale({
      groupDirs,
      expected,
      index,
      provider,
      ledger,
      dryRun: true,
    });
    for (const decision of cleanup.decisions) {
      if (decision.action === "delete") {
        p.log.info(`  - ${toUserPath(decision.path)} (${decision.reason})`);
      }
    }

    return { plan, stats, ledger, recovered: [], cleanup, report: null };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PHASE 3: EXECUTE
  // ─────────────────────────────────────────────────────────────────────────
  p.log.step(`Phase 3: Syncing with ${options.concurrency} workers...`);

  const waves = await runWaves(plan.tasks, vcs, {
    concurrency: options.concurrency,
    stats,
    ledger,
    onWaveStart: (wave, total) => {
      p.log.info(wave === "clone" ? `  Cloning ${total} missing...` : `  Updating ${total}...`);
    },
    onSettled: (result, completed, total) => logResult(result, completed, total),
  });

  if (plan.tasks.length === 0) {
    p.log.info("  Nothing to clone or update");
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PHASE 4: RETRY
  // ─────────────────────────────────────────────────────────────────────────
  const failed = collectFailures(waves.missing, waves.toUpdate);
  let recovered: SyncTask[] = [];

  if (failed.length > 0) {
    p.log.step(`Phase 4: Retrying ${failed.length} failure(s)...`);

    const retry = await retryFailures(failed, vcs, {
      stats,
      ledger,
      onSettled: (result, position, total) => logResult(result, position, total),
    });
    recovered = retry.recovered;

    if (recovered.length > 0) {
      p.log.success(`  ${recovered.length} recovered on retry`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PHASE 5: CLEANUP
  // ─────────────────────────────────────────────────────────────────────────
  p.log.step("Phase 5: Removing repositories gone from remote...");

  const cleanup = await cleanupStale({ groupDirs, expected, index, provider, ledger });
  stats.deleted += cleanup.deleted;

  for (const warning of cleanup.warnings) {
    p.log.warn(`  ${warning}`);
  }
  for (const decision of cleanup.decisions) {
    if (decision.action === "delete") {
      p.log.info(`  - ${toUserPath(decision.path)} (${decision.reason})`);
    } else if (decision.action === "failed") {
      p.log.error(`  ✗ ${toUserPath(decision.path)}: ${decision.reason}`);
    }
  }
  if (cleanup.deleted === 0) {
    p.log.info(`  ${cleanup.checked} checked, nothing removed`);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // REPORT
  // ─────────────────────────────────────────────────────────────────────────
  const after = await scanInventory(groupDirs, index);
  const report = buildDiffReport(
    planExpectedIds(plan),
    after.records.map((record) => record.id ?? record.shortName),
    stats.failed
  );
  const metadata = await fetchMetadata(provider, report.missing);

  console.log();
  console.log("─".repeat(50));
  console.log(pc.bold("Summary"));
  for (const line of formatStats(stats)) console.log(line);

  if (ledger.size > 0) {
    console.log();
    console.log(pc.bold("Failures"));
    const recoveredIds = new Set(recovered.map((task) => task.id));
    for (const line of formatFailureLedger(ledger.entries(), recoveredIds)) console.log(line);
  }

  console.log();
  console.log(pc.bold("Expected vs local"));
  for (const line of formatDiffReport(report, metadata)) console.log(line);

  return { plan, stats, ledger, recovered, cleanup, report };
}

export default defineCommand({
  meta: {
    name: "repo-groups",
    version: "0.1.0",
    description: "Clone, update and prune a grouped local mirror of GitHub repositories",
  },
  args: {
    root: {
      type: "string",
      description: "Mirror root directory (default: current directory)",
    },
    config: {
      type: "string",
      description: `Grouping document (default: <root>/${DEFAULTS.configFileName})`,
    },
    concurrency: {
      type: "string",
      alias: "j",
      description: `Parallel workers per wave (default: ${DEFAULTS.concurrency})`,
    },
    group: {
      type: "string",
      description: "Comma-separated group names to sync (fuzzy, default: all)",
    },
    "dry-run": {
      type: "boolean",
      description: "Show what would happen without making changes",
    },
  },
  async run({ args }) {
    p.intro("repo-groups");

    const { settings, issues } = loadSettings();
    for (const issue of issues) {
      p.log.warn(issue);
    }

    const root = getRootDir(args.root, settings);
    const { value: concurrency, warning } = resolveConcurrency(args.concurrency, settings);
    if (warning) {
      p.log.warn(warning);
    }

    const token = getGitHubToken();
    if (!token) {
      p.log.warn("No GITHUB_TOKEN or GH_TOKEN set; the repository listing will fail");
    }

    const provider = createGitHubProvider(token);
    const options: SyncOptions = {
      root,
      catalogPath: getCatalogPath(args.config, root, settings),
      concurrency,
      listLimit: settings.listLimit ?? DEFAULTS.listLimit,
      groups: parseGroupList(args.group),
      dryRun: args["dry-run"] || false,
    };

    p.log.info(`Root: ${toUserPath(root)}`);

    try {
      const summary = await runSync(options, { provider, vcs: createGitOperations(provider) });
      p.outro(summary.report ? formatVerdict(summary.report) : "Dry run complete");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      p.log.error(message);
      p.outro(pc.red("Sync aborted"));
      process.exit(1);
    }
  },
});
