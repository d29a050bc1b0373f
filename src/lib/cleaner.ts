import { rm } from "node:fs/promises";
import type { SourceControlProvider } from "./github.js";
import { scanGroupDirs } from "./inventory.js";
import type { FailureLedger } from "./ledger.js";
import type { RemoteIndex } from "./remote-index.js";
import { formatRepoId, isValidRepoId } from "./repo-id.js";

export type CleanupAction = "keep" | "delete" | "failed";

export interface CleanupDecision {
  path: string;
  shortName: string;
  action: CleanupAction;
  reason: string;
}

export interface CleanupResult {
  checked: number;
  deleted: number;
  decisions: CleanupDecision[];
  warnings: string[];
}

export interface CleanupOptions {
  groupDirs: string[];
  /** Canonical ids the grouping document asks for */
  expected: ReadonlySet<string>;
  index: RemoteIndex;
  provider: SourceControlProvider;
  ledger: FailureLedger;
  /** Report what would be deleted without touching the disk */
  dryRun?: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Remove clones whose repository is gone upstream. A directory is deleted only
 * when it carries a .git marker, is not expected, is not in the index, and a
 * direct lookup under the authenticated owner reports it missing.
 */
export async function cleanupStale(options: CleanupOptions): Promise<CleanupResult> {
  const { expected, index, provider, ledger } = options;
  const records = await scanGroupDirs(options.groupDirs);
  const decisions: CleanupDecision[] = [];
  const warnings: string[] = [];
  let checked = 0;
  let deleted = 0;

  let viewer: string | null;
  try {
    viewer = await provider.getViewer();
  } catch (error) {
    viewer = null;
    warnings.push(`Could not determine the repository owner: ${errorMessage(error)}`);
  }
  if (!viewer) {
    warnings.push("Repository owner unknown; directories missing from the index are kept");
  }

  const keep = (path: string, shortName: string, reason: string) => {
    decisions.push({ path, shortName, action: "keep", reason });
  };

  for (const record of records) {
    if (!record.hasMarker) continue;

    checked += 1;
    const { path, shortName } = record;
    const id = index.lookup(shortName);

    if (id !== undefined && expected.has(id)) {
      keep(path, shortName, "listed in a group");
      continue;
    }

    if (id !== undefined) {
      keep(path, shortName, "still on remote, not in the selected groups");
      continue;
    }

    if (!viewer) {
      keep(path, shortName, "owner unknown");
      continue;
    }

    const candidate = formatRepoId(viewer, shortName);
    if (!isValidRepoId(candidate)) {
      keep(path, shortName, "not a repository name");
      continue;
    }

    let exists: boolean;
    try {
      exists = await provider.repoExists(candidate);
    } catch (error) {
      const message = `existence check failed: ${errorMessage(error)}`;
      ledger.append({ shortName, category: "cleanup", message, attempt: 1 });
      decisions.push({ path, shortName, action: "failed", reason: message });
      continue;
    }

    if (exists) {
      keep(path, shortName, "still on remote, not in the selected groups");
      continue;
    }

    if (options.dryRun) {
      decisions.push({ path, shortName, action: "delete", reason: "would delete: gone from remote" });
      continue;
    }

    try {
      await rm(path, { recursive: true, force: true });
      deleted += 1;
      decisions.push({ path, shortName, action: "delete", reason: "gone from remote" });
    } catch (error) {
      const message = `delete failed: ${errorMessage(error)}`;
      ledger.append({ shortName, category: "cleanup", message, attempt: 1 });
      decisions.push({ path, shortName, action: "failed", reason: message });
    }
  }

  return { checked, deleted, decisions, warnings };
}
