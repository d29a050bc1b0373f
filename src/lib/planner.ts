import { existsSync } from "node:fs";
import { mkdir, rename } from "node:fs/promises";
import type {
  DiffPlan,
  Group,
  GroupPlan,
  LegacyMigration,
  SyncTask,
} from "../types/index.js";
import { getGroupDir, getLegacyRepoPath, getRepoPath } from "./config.js";
import { hasVcsMarker } from "./inventory.js";
import type { RemoteIndex } from "./remote-index.js";

export interface PlanOptions {
  root: string;
  index: RemoteIndex;
  /** Move flat-layout clones into their group; false leaves the disk untouched */
  migrateLegacy: boolean;
}

function createTask(
  id: string,
  shortName: string,
  group: Group,
  targetDir: string,
  kind: SyncTask["kind"]
): SyncTask {
  return {
    id,
    shortName,
    group: group.name,
    targetDir,
    kind,
    priority: kind === "clone" ? "high" : "low",
    attempts: 0,
  };
}

async function migrateLegacyCopy(from: string, to: string, groupDir: string): Promise<void> {
  await mkdir(groupDir, { recursive: true });
  await rename(from, to);
}

async function planGroup(group: Group, options: PlanOptions): Promise<GroupPlan> {
  const dir = getGroupDir(options.root, group);
  const plan: GroupPlan = {
    group,
    dir,
    missing: [],
    toUpdate: [],
    skipped: [],
    unresolvable: [],
    migrations: [],
  };

  if (options.migrateLegacy) {
    await mkdir(dir, { recursive: true });
  }

  const planned = new Set<string>();

  for (const shortName of group.repos) {
    const targetDir = getRepoPath(options.root, group, shortName);
    if (planned.has(targetDir)) {
      plan.skipped.push({ shortName, path: targetDir, reason: "listed twice in this group" });
      continue;
    }
    planned.add(targetDir);

    let id: string | undefined;
    try {
      id = await options.index.resolve(shortName);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      plan.unresolvable.push({ shortName, reason: message });
      continue;
    }

    if (id === undefined) {
      plan.unresolvable.push({ shortName, reason: "remote repository not found" });
      continue;
    }

    const legacyPath = getLegacyRepoPath(options.root, shortName);

    if (hasVcsMarker(targetDir)) {
      plan.toUpdate.push(createTask(id, shortName, group, targetDir, "update"));
    } else if (hasVcsMarker(legacyPath)) {
      const migration: LegacyMigration = {
        shortName,
        from: legacyPath,
        to: targetDir,
        moved: false,
      };

      if (options.migrateLegacy) {
        try {
          await migrateLegacyCopy(legacyPath, targetDir, dir);
          migration.moved = true;
        } catch (error) {
          migration.error = error instanceof Error ? error.message : String(error);
        }
      }

      plan.migrations.push(migration);
      plan.toUpdate.push(createTask(id, shortName, group, targetDir, "update"));
    } else if (existsSync(targetDir)) {
      plan.skipped.push({
        shortName,
        id,
        path: targetDir,
        reason: "directory exists but is not a git repository",
      });
    } else {
      plan.missing.push(createTask(id, shortName, group, targetDir, "clone"));
    }
  }

  return plan;
}

/**
 * Classify every configured repository and order the work: all missing
 * repositories (every group) before any refresh
 */
export async function computeDiff(groups: Group[], options: PlanOptions): Promise<DiffPlan> {
  const plans: GroupPlan[] = [];

  for (const group of groups) {
    plans.push(await planGroup(group, options));
  }

  const tasks = [
    ...plans.flatMap((plan) => plan.missing),
    ...plans.flatMap((plan) => plan.toUpdate),
  ];

  return { groups: plans, tasks };
}

export function countPlan(plan: DiffPlan): {
  missing: number;
  toUpdate: number;
  skipped: number;
  unresolvable: number;
  total: number;
} {
  const counts = { missing: 0, toUpdate: 0, skipped: 0, unresolvable: 0, total: 0 };

  for (const group of plan.groups) {
    counts.missing += group.missing.length;
    counts.toUpdate += group.toUpdate.length;
    counts.skipped += group.skipped.length;
    counts.unresolvable += group.unresolvable.length;
  }

  counts.total = counts.missing + counts.toUpdate + counts.skipped + counts.unresolvable;
  return counts;
}
