import type { RunStats, SyncTask, TaskResult } from "../types/index.js";
import type { VcsOperations } from "./git.js";
import type { FailureLedger } from "./ledger.js";
import { executeTask } from "./scheduler.js";

export interface RetrySummary {
  attempted: number;
  recovered: SyncTask[];
  results: TaskResult[];
}

export interface RetryOptions {
  stats: RunStats;
  ledger: FailureLedger;
  onStart?: (total: number) => void;
  onSettled?: (result: TaskResult, position: number, total: number) => void;
}

/**
 * Clone and update failures from the waves, in the order they ran
 */
export function collectFailures(...waves: readonly TaskResult[][]): SyncTask[] {
  return waves
    .flat()
    .filter((result) => result.outcome.status === "failure")
    .map((result) => result.task);
}

/**
 * Replay each failed task once, one at a time. A recovered task moves from
 * the failure count to the added/updated count.
 */
export async function retryFailures(
  failed: readonly SyncTask[],
  vcs: VcsOperations,
  options: RetryOptions
): Promise<RetrySummary> {
  const recovered: SyncTask[] = [];
  const results: TaskResult[] = [];

  if (failed.length > 0) {
    options.onStart?.(failed.length);
  }

  for (const [index, task] of failed.entries()) {
    const result = await executeTask(task, vcs);
    results.push(result);

    if (result.outcome.status === "success") {
      options.stats.failed -= 1;
      if (task.kind === "clone") options.stats.added += 1;
      else options.stats.updated += 1;
      recovered.push(task);
    } else {
      options.ledger.appendTaskFailure(task, result.outcome.reason);
    }

    options.onSettled?.(result, index + 1, failed.length);
  }

  return { attempted: failed.length, recovered, results };
}
