/**
 * Shared types for repo-groups
 */

/**
 * A named set of repositories mirrored into one local directory
 */
export interface Group {
  name: string;
  tag?: string; // Inline comment label, e.g. "3号高地"
  repos: string[]; // Short names, in declared order
}

export interface Catalog {
  path: string;
  groups: Group[];
}

/**
 * A directory found under a group directory
 */
export interface LocalRepoRecord {
  path: string;
  shortName: string;
  groupDir: string;
  hasMarker: boolean;
  id?: string; // Canonical id, when the short name resolves
}

export interface InventorySnapshot {
  records: LocalRepoRecord[];
  ids: Set<string>;
  pathToId: Map<string, string>;
}

export type TaskKind = "clone" | "update";

/**
 * high = missing locally, low = already present
 */
export type TaskPriority = "high" | "low";

export interface SyncTask {
  id: string; // owner/name
  shortName: string;
  group: string;
  targetDir: string;
  kind: TaskKind;
  priority: TaskPriority;
  attempts: number;
  lastError?: string;
}

export type FailureCategory =
  | "remote-unresolvable"
  | "clone"
  | "update"
  | "legacy-move"
  | "cleanup";

export interface FailureRecord {
  readonly id?: string;
  readonly shortName: string;
  readonly group?: string;
  readonly category: FailureCategory;
  readonly message: string;
  readonly attempt: number;
}

export interface SkippedRepo {
  shortName: string;
  id?: string;
  path: string;
  reason: string;
}

export interface UnresolvableRepo {
  shortName: string;
  reason: string;
}

export interface LegacyMigration {
  shortName: string;
  from: string;
  to: string;
  moved: boolean;
  error?: string;
}

export interface GroupPlan {
  group: Group;
  dir: string;
  missing: SyncTask[];
  toUpdate: SyncTask[];
  skipped: SkippedRepo[];
  unresolvable: UnresolvableRepo[];
  migrations: LegacyMigration[];
}

export interface DiffPlan {
  groups: GroupPlan[];
  tasks: SyncTask[]; // Every high-priority task precedes every low-priority one
}

/**
 * Result of a single clone or update call
 */
export type OperationResult =
  | { ok: true; detail?: string }
  | { ok: false; reason: string };

export type TaskOutcome =
  | { status: "success"; detail?: string }
  | { status: "failure"; reason: string }
  | { status: "skipped"; reason: string };

export interface TaskResult {
  task: SyncTask;
  outcome: TaskOutcome;
  durationMs: number;
}

export interface RunStats {
  added: number;
  updated: number;
  deleted: number;
  failed: number;
  skipped: number;
}

/**
 * Repository metadata reported by the provider
 */
export interface RepoMetadata {
  name: string;
  fullName: string;
  description: string | null;
  language: string | null;
  stars: number;
  forks: number;
  updatedAt: string | null;
  archived: boolean;
  private: boolean;
  defaultBranch: string;
}

/**
 * Persisted user settings (config.json)
 */
export interface Settings {
  root?: string;
  configFile?: string;
  concurrency?: number;
  listLimit?: number;
}
