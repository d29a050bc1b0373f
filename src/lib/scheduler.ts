import { existsSync } from "node:fs";
import type {
  RunStats,
  SyncTask,
  TaskKind,
  TaskOutcome,
  TaskResult,
} from "../types/index.js";
import type { VcsOperations } from "./git.js";
import { hasVcsMarker } from "./inventory.js";
import type { FailureLedger } from "./ledger.js";

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Items start in list order; each result lands in the slot of its item.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const runNext = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  };

  const runners = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: runners }, runNext));

  return results;
}

async function runTask(task: SyncTask, vcs: VcsOperations): Promise<TaskOutcome> {
  if (task.kind === "clone") {
    if (hasVcsMarker(task.targetDir)) {
      return { status: "skipped", reason: "already cloned" };
    }
    if (existsSync(task.targetDir)) {
      return { status: "skipped", reason: "directory exists but is not a git repository" };
    }
  }

  try {
    const result =
      task.kind === "clone"
        ? await vcs.clone(task.id, task.targetDir)
        : await vcs.update(task.id, task.targetDir);

    return result.ok
      ? { status: "success", detail: result.detail }
      : { status: "failure", reason: result.reason };
  } catch (error) {
    return { status: "failure", reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Perform one task. Never rejects: collaborator errors become a failure outcome.
 */
export async function executeTask(task: SyncTask, vcs: VcsOperations): Promise<TaskResult> {
  const started = Date.now();
  task.attempts += 1;

  const outcome = await runTask(task, vcs);
  if (outcome.status === "failure") {
    task.lastError = outcome.reason;
  }

  return { task, outcome, durationMs: Date.now() - started };
}

/**
 * Fold settled results into the run totals. Called once per wave, after it
 * has drained.
 */
export function aggregateResults(
  results: readonly TaskResult[],
  stats: RunStats,
  ledger: FailureLedger
): void {
  for (const { task, outcome } of results) {
    switch (outcome.status) {
      case "success":
        if (task.kind === "clone") stats.added += 1;
        else stats.updated += 1;
        break;
      case "failure":
        stats.failed += 1;
        ledger.appendTaskFailure(task, outcome.reason);
        break;
      case "skipped":
        stats.skipped += 1;
        break;
    }
  }
}

export type SettledListener = (
  result: TaskResult,
  completed: number,
  total: number,
  wave: TaskKind
) => void;

export interface WaveOptions {
  concurrency: number;
  stats: RunStats;
  ledger: FailureLedger;
  onWaveStart?: (wave: TaskKind, total: number) => void;
  onSettled?: SettledListener;
}

export interface WaveResults {
  missing: TaskResult[];
  toUpdate: TaskResult[];
}

async function runWave(
  tasks: SyncTask[],
  vcs: VcsOperations,
  wave: TaskKind,
  options: WaveOptions
): Promise<TaskResult[]> {
  if (tasks.length === 0) return [];

  options.onWaveStart?.(wave, tasks.length);

  let completed = 0;
  const results = await runPool(tasks, options.concurrency, async (task) => {
    const result = await executeTask(task, vcs);
    completed += 1;
    options.onSettled?.(result, completed, tasks.length, wave);
    return result;
  });

  aggregateResults(results, options.stats, options.ledger);
  return results;
}

/**
 * Clone everything missing, then refresh what exists. The refresh wave does
 * not start until every clone has settled.
 */
export async function runWaves(
  tasks: readonly SyncTask[],
  vcs: VcsOperations,
  options: WaveOptions
): Promise<WaveResults> {
  const missing = await runWave(
    tasks.filter((task) => task.priority === "high"),
    vcs,
    "clone",
    options
  );

  const toUpdate = await runWave(
    tasks.filter((task) => task.priority === "low"),
    vcs,
    "update",
    options
  );

  return { missing, toUpdate };
}

export function createStats(): RunStats {
  return { added: 0, updated: 0, deleted: 0, failed: 0, skipped: 0 };
}
