import type { FailureRecord, RepoMetadata, RunStats, TaskResult } from "../types/index.js";
import { formatRelativeTime } from "./ui-utils.js";

export const DESCRIPTION_LIMIT = 60;
export const EXTRA_LIST_LIMIT = 20;

export interface DiffReport {
  expected: string[];
  local: string[];
  synced: string[];
  missing: string[];
  extra: string[];
  failed: number;
  /** floor(synced * 100 / expected), null when nothing is expected */
  successRate: number | null;
}

/**
 * Compare what the selected groups ask for with what is on disk after the run
 */
export function buildDiffReport(
  expected: Iterable<string>,
  local: Iterable<string>,
  failed: number
): DiffReport {
  const expectedIds = [...new Set(expected)];
  const localIds = [...new Set(local)];
  const expectedSet = new Set(expectedIds);
  const localSet = new Set(localIds);

  const synced = expectedIds.filter((id) => localSet.has(id));
  const missing = expectedIds.filter((id) => !localSet.has(id));
  const extra = localIds.filter((id) => !expectedSet.has(id));

  return {
    expected: expectedIds,
    local: localIds,
    synced,
    missing,
    extra,
    failed,
    successRate:
      expectedIds.length > 0 ? Math.floor((synced.length * 100) / expectedIds.length) : null,
  };
}

const STATUS_SYMBOLS = { success: "✓", failure: "✗", skipped: "○" } as const;

/**
 * "[3/12] ✓ clone acme/alpha (Tools) 2.1s"
 */
export function formatProgressLine(result: TaskResult, completed: number, total: number): string {
  const { task, outcome } = result;
  const seconds = (result.durationMs / 1000).toFixed(1);
  const head = `[${completed}/${total}] ${STATUS_SYMBOLS[outcome.status]} ${task.kind} ${task.id} (${task.group}) ${seconds}s`;

  if (outcome.status === "success") {
    return outcome.detail ? `${head}: ${outcome.detail}` : head;
  }
  return `${head}: ${outcome.reason}`;
}

export function truncateDescription(text: string): string {
  return text.length > DESCRIPTION_LIMIT ? `${text.slice(0, DESCRIPTION_LIMIT - 3)}...` : text;
}

export function formatStats(stats: RunStats): string[] {
  return [
    `Added:   ${stats.added}`,
    `Updated: ${stats.updated}`,
    `Deleted: ${stats.deleted}`,
    `Failed:  ${stats.failed}`,
    `Skipped: ${stats.skipped}`,
  ];
}

/**
 * One numbered line per ledger record. Records for tasks that later succeeded
 * on retry are marked.
 */
export function formatFailureLedger(
  records: readonly FailureRecord[],
  recovered: ReadonlySet<string> = new Set()
): string[] {
  return records.map((record, index) => {
    const label = record.id ?? record.shortName;
    const attempt = record.attempt > 1 ? ` (attempt ${record.attempt})` : "";
    const mark = record.id !== undefined && recovered.has(record.id) ? " [recovered on retry]" : "";
    return `${index + 1}. [${record.category}] ${label}${attempt}: ${record.message}${mark}`;
  });
}

export function formatMissingRepo(id: string, metadata: RepoMetadata | null): string[] {
  const lines = [`- ${id}`];
  if (!metadata) return lines;

  const facts: string[] = [];
  if (metadata.language) facts.push(metadata.language);
  if (metadata.stars > 0) facts.push(`★ ${metadata.stars}`);
  if (metadata.archived) facts.push("archived");
  if (metadata.updatedAt) facts.push(`updated ${formatRelativeTime(metadata.updatedAt)}`);

  if (facts.length > 0) lines.push(`  ${facts.join(" · ")}`);
  if (metadata.description) lines.push(`  ${truncateDescription(metadata.description)}`);

  return lines;
}

export function formatDiffReport(
  report: DiffReport,
  metadata: ReadonlyMap<string, RepoMetadata | null> = new Map()
): string[] {
  const lines = [
    `Expected:     ${report.expected.length}`,
    `Local:        ${report.local.length}`,
    `Synced:       ${report.synced.length}`,
    `Missing:      ${report.missing.length}`,
    `Extra:        ${report.extra.length}`,
    `Failed:       ${report.failed}`,
    `Success rate: ${report.successRate === null ? "n/a" : `${report.successRate}%`}`,
  ];

  if (report.missing.length > 0) {
    lines.push("", "Missing repositories:");
    for (const id of report.missing) {
      lines.push(...formatMissingRepo(id, metadata.get(id) ?? null));
    }
  }

  if (report.extra.length > EXTRA_LIST_LIMIT) {
    lines.push("", `Extra repositories: ${report.extra.length} (too many to list)`);
  } else if (report.extra.length > 0) {
    lines.push("", "Extra repositories:", ...report.extra.map((id) => `- ${id}`));
  }

  return lines;
}

export function formatVerdict(report: DiffReport): string {
  if (report.missing.length === 0 && report.failed === 0) {
    return "All expected repositories are synced";
  }
  return `${report.missing.length} missing, ${report.failed} failed`;
}
