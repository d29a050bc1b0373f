import { existsSync } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { InventorySnapshot, LocalRepoRecord } from "../types/index.js";
import type { RemoteIndex } from "./remote-index.js";

/**
 * A managed clone carries a .git entry (directory, or file for worktrees)
 */
export function hasVcsMarker(path: string): boolean {
  return existsSync(join(path, ".git"));
}

/**
 * Immediate child directories of a group directory
 */
export async function listChildDirs(dir: string): Promise<string[]> {
  if (!existsSync(dir)) return [];

  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/**
 * Every child directory of the given group directories, marked or not
 */
export async function scanGroupDirs(groupDirs: string[]): Promise<LocalRepoRecord[]> {
  const records: LocalRepoRecord[] = [];

  for (const groupDir of groupDirs) {
    for (const name of await listChildDirs(groupDir)) {
      const path = join(groupDir, name);
      records.push({ path, shortName: name, groupDir, hasMarker: hasVcsMarker(path) });
    }
  }

  return records;
}

/**
 * Snapshot of what is present locally, keyed by canonical id. Children whose
 * name does not resolve in the index are kept in `records` without an id.
 */
export async function scanInventory(
  groupDirs: string[],
  index: RemoteIndex
): Promise<InventorySnapshot> {
  const records = (await scanGroupDirs(groupDirs)).filter((record) => record.hasMarker);
  const ids = new Set<string>();
  const pathToId = new Map<string, string>();

  for (const record of records) {
    const id = index.lookup(record.shortName);
    if (id === undefined) continue;

    record.id = id;
    ids.add(id);
    pathToId.set(record.path, id);
  }

  return { records, ids, pathToId };
}
