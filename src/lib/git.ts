import { simpleGit, type SimpleGit } from "simple-git";
import { existsSync } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { OperationResult } from "../types/index.js";
import { DEFAULTS } from "./config.js";
import type { SourceControlProvider } from "./github.js";
import { hasVcsMarker } from "./inventory.js";
import { toCloneUrl } from "./repo-id.js";

// Kill a git process that has produced no output for this long
const BLOCK_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * The clone/update collaborator the scheduler drives
 */
export interface VcsOperations {
  clone(id: string, destPath: string): Promise<OperationResult>;
  update(id: string, destPath: string): Promise<OperationResult>;
}

export interface WorkingTreeState {
  branch: string | null; // null when HEAD is detached
  dirty: boolean;
}

export type PullMode = "rebase" | "merge" | "ff-only";

/**
 * The git commands the update chain needs, one working tree at a time
 */
export interface GitClient {
  state(): Promise<WorkingTreeState>;
  head(): Promise<string | null>;
  checkout(branch: string): Promise<void>;
  /** Resolves true when a stash entry was created */
  stash(): Promise<boolean>;
  stashPop(): Promise<void>;
  hasRemote(name: string): Promise<boolean>;
  /** With no remote/branch, git picks the tracking defaults */
  pull(remote: string | undefined, branch: string | undefined, mode: PullMode): Promise<void>;
  abortRebase(): Promise<void>;
  abortMerge(): Promise<void>;
  abortCherryPick(): Promise<void>;
}

function createGit(baseDir?: string): SimpleGit {
  return simpleGit({
    ...(baseDir ? { baseDir } : {}),
    timeout: { block: BLOCK_TIMEOUT_MS },
  });
}

/**
 * GitClient backed by simple-git
 */
export function createGitClient(localPath: string): GitClient {
  const git = createGit(localPath);

  const gitDirHas = async (entry: string): Promise<boolean> => {
    const gitDir = (await git.revparse(["--absolute-git-dir"])).trim();
    return existsSync(join(gitDir, entry));
  };

  return {
    async state() {
      const status = await git.status();
      return {
        branch: status.detached ? null : status.current,
        dirty: status.files.length > 0,
      };
    },

    async head() {
      try {
        return (await git.revparse(["HEAD"])).trim();
      } catch {
        // Unborn branch
        return null;
      }
    },

    async checkout(branch) {
      await git.checkout(branch);
    },

    async stash() {
      const output = await git.stash(["push", "--include-untracked", "-m", "repo-groups autostash"]);
      return !output.includes("No local changes to save");
    },

    async stashPop() {
      await git.stash(["pop"]);
    },

    async hasRemote(name) {
      const remotes = await git.getRemotes();
      return remotes.some((remote) => remote.name === name);
    },

    async pull(remote, branch, mode) {
      const args = ["pull", "--no-edit"];
      if (mode === "rebase") args.push("--rebase");
      if (mode === "ff-only") args.push("--ff-only");
      if (remote) args.push(remote);
      if (remote && branch) args.push(branch);
      await git.raw(args);
    },

    async abortRebase() {
      if ((await gitDirHas("rebase-merge")) || (await gitDirHas("rebase-apply"))) {
        await git.raw(["rebase", "--abort"]);
      }
    },

    async abortMerge() {
      if (await gitDirHas("MERGE_HEAD")) {
        await git.raw(["merge", "--abort"]);
      }
    },

    async abortCherryPick() {
      if (await gitDirHas("CHERRY_PICK_HEAD")) {
        await git.raw(["cherry-pick", "--abort"]);
      }
    },
  };
}

export class GitCloneError extends Error {
  constructor(
    public readonly id: string,
    message: string
  ) {
    super(message);
    this.name = "GitCloneError";
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

/**
 * Clone a repository to a local path. The target directory is claimed with a
 * non-recursive mkdir first; a failed clone removes it only if this call
 * created it.
 */
export async function cloneRepo(
  id: string,
  localPath: string,
  options: { url?: string; remoteName?: string } = {}
): Promise<void> {
  const url = options.url ?? toCloneUrl(id);
  const remoteName = options.remoteName ?? DEFAULTS.originRemote;

  await mkdir(dirname(localPath), { recursive: true });

  let created = false;
  try {
    await mkdir(localPath);
    created = true;
  } catch (error) {
    if (!isAlreadyExists(error)) {
      throw new GitCloneError(id, errorMessage(error));
    }
  }

  try {
    await createGit().clone(url, localPath, ["--origin", remoteName]);
  } catch (error) {
    let message = errorMessage(error);

    if (created) {
      try {
        await rm(localPath, { recursive: true, force: true });
      } catch (cleanupError) {
        message += ` (partial clone left at ${localPath}: ${errorMessage(cleanupError)})`;
      }
    }

    throw new GitCloneError(id, message.trim());
  }
}

interface UpdateStep {
  name: string;
  run: () => Promise<void>;
}

async function resolveDefaultBranch(
  provider: SourceControlProvider,
  id: string
): Promise<string> {
  const metadata = await provider.getRepoMetadata(id);
  return metadata?.defaultBranch || DEFAULTS.defaultBranch;
}

async function clearInProgress(git: GitClient): Promise<void> {
  await git.abortMerge();
  await git.abortCherryPick();
  await git.abortRebase();
}

function describeChange(before: string | null, after: string | null): string {
  if (before && after && before !== after) {
    return `${before.slice(0, 8)} → ${after.slice(0, 8)}`;
  }
  return "already up to date";
}

function errorMessage(error: unknown): string {
  return (error instanceof Error ? error.message : String(error)).trim();
}

async function runUpdateSteps(
  git: GitClient,
  id: string,
  provider: SourceControlProvider,
  branch: string
): Promise<OperationResult> {
  const before = await git.head();
  const steps: UpdateStep[] = [];

  if (await git.hasRemote(DEFAULTS.upstreamRemote)) {
    steps.push({
      name: "upstream sync",
      run: async () => {
        await provider.syncFork(id, branch);
        await git.pull(DEFAULTS.originRemote, branch, "ff-only");
      },
    });
  }

  steps.push(
    {
      name: "rebase pull",
      run: () => git.pull(DEFAULTS.originRemote, branch, "rebase"),
    },
    {
      name: "merge pull",
      run: async () => {
        await git.abortRebase();
        await git.pull(DEFAULTS.originRemote, branch, "merge");
      },
    },
    {
      name: "default pull",
      run: async () => {
        await git.abortMerge();
        await git.pull(undefined, undefined, "merge");
      },
    }
  );

  const failures: string[] = [];

  for (const step of steps) {
    try {
      await step.run();
      const after = await git.head();
      return { ok: true, detail: `${step.name}, ${describeChange(before, after)}` };
    } catch (error) {
      failures.push(`${step.name}: ${errorMessage(error)}`);
    }
  }

  try {
    await clearInProgress(git);
  } catch (error) {
    failures.push(`cleanup: ${errorMessage(error)}`);
  }

  return { ok: false, reason: failures.join("; ") };
}

/**
 * Bring an existing clone up to date.
 *
 * Detached HEAD is moved to the default branch and local changes are stashed
 * for the duration. Strategies are tried in order until one succeeds:
 * upstream fork sync, rebase pull, merge pull, then a bare `git pull`.
 */
export async function updateRepo(
  git: GitClient,
  id: string,
  provider: SourceControlProvider
): Promise<OperationResult> {
  await clearInProgress(git);

  const state = await git.state();
  let branch = state.branch;
  if (branch === null) {
    branch = await resolveDefaultBranch(provider, id);
    await git.checkout(branch);
  }

  const stashed = state.dirty ? await git.stash() : false;

  let result: OperationResult;
  try {
    result = await runUpdateSteps(git, id, provider, branch);
  } catch (error) {
    result = { ok: false, reason: errorMessage(error) };
  }

  if (!stashed) return result;

  try {
    await git.stashPop();
    return result;
  } catch (error) {
    const note = `local changes left in git stash (${errorMessage(error)})`;
    return result.ok
      ? { ok: true, detail: result.detail ? `${result.detail}; ${note}` : note }
      : { ok: false, reason: `${result.reason}; ${note}` };
  }
}

/**
 * Real VcsOperations: simple-git on disk, GitHub for default branches and
 * fork sync
 */
export function createGitOperations(
  provider: SourceControlProvider,
  clientFactory: (localPath: string) => GitClient = createGitClient
): VcsOperations {
  return {
    async clone(id, destPath) {
      try {
        await cloneRepo(id, destPath);
        return { ok: true };
      } catch (error) {
        return { ok: false, reason: errorMessage(error) };
      }
    },

    async update(id, destPath) {
      if (!hasVcsMarker(destPath)) {
        return { ok: false, reason: `not a git repository: ${destPath}` };
      }

      try {
        return await updateRepo(clientFactory(destPath), id, provider);
      } catch (error) {
        return { ok: false, reason: errorMessage(error) };
      }
    },
  };
}
