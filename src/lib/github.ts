/**
 * GitHub API client: the source control provider behind a run
 */

import type { RepoMetadata } from "../types/index.js";
import { parseRepoId } from "./repo-id.js";

const API_ROOT = "https://api.github.com";
const PAGE_SIZE = 100;

/**
 * Everything a run needs from the hosting service
 */
export interface SourceControlProvider {
  /** Canonical ids visible to the authenticated user, at most `limit` */
  listRepos(limit: number): Promise<string[]>;
  /** Login of the authenticated user, or null when unauthenticated */
  getViewer(): Promise<string | null>;
  /** false only on a definitive "not found" */
  repoExists(id: string): Promise<boolean>;
  getRepoMetadata(id: string): Promise<RepoMetadata | null>;
  /** Bring the hosted fork's branch up to date with its parent */
  syncFork(id: string, branch: string): Promise<void>;
}

export class GitHubApiError extends Error {
  constructor(
    message: string,
    public readonly status: number | null
  ) {
    super(message);
    this.name = "GitHubApiError";
  }
}

interface GitHubRepoPayload {
  name: string;
  full_name: string;
  description: string | null;
  language: string | null;
  stargazers_count: number;
  forks_count: number;
  updated_at: string | null;
  archived: boolean;
  private: boolean;
  default_branch: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function numberOrZero(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

function toRepoPayload(value: unknown): GitHubRepoPayload | null {
  if (!isRecord(value) || typeof value.full_name !== "string") {
    return null;
  }

  return {
    name: typeof value.name === "string" ? value.name : value.full_name,
    full_name: value.full_name,
    description: stringOrNull(value.description),
    language: stringOrNull(value.language),
    stargazers_count: numberOrZero(value.stargazers_count),
    forks_count: numberOrZero(value.forks_count),
    updated_at: stringOrNull(value.updated_at),
    archived: value.archived === true,
    private: value.private === true,
    default_branch: typeof value.default_branch === "string" ? value.default_branch : "main",
  };
}

export interface GitHubProviderOptions {
  token?: string;
  apiRoot?: string;
  userAgent?: string;
}

export class GitHubProvider implements SourceControlProvider {
  private readonly token?: string;
  private readonly apiRoot: string;
  private readonly userAgent: string;
  private viewer: Promise<string | null> | undefined;

  constructor(options: GitHubProviderOptions = {}) {
    this.token = options.token;
    this.apiRoot = options.apiRoot ?? API_ROOT;
    this.userAgent = options.userAgent ?? "repo-groups";
  }

  private async request(path: string, init: RequestInit = {}): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "User-Agent": this.userAgent,
      "X-GitHub-Api-Version": "2022-11-28",
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    try {
      return await fetch(`${this.apiRoot}${path}`, { ...init, headers });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new GitHubApiError(`Request to ${path} failed: ${message}`, null);
    }
  }

  private async expectOk(response: Response, what: string): Promise<unknown> {
    if (!response.ok) {
      throw new GitHubApiError(
        `${what} failed: ${response.status} ${response.statusText}`.trim(),
        response.status
      );
    }
    return response.json();
  }

  async listRepos(limit: number): Promise<string[]> {
    if (!this.token) {
      throw new GitHubApiError(
        "Listing repositories requires a token. Set GITHUB_TOKEN or GH_TOKEN.",
        401
      );
    }

    const ids: string[] = [];
    let page = 1;

    while (ids.length < limit) {
      const perPage = Math.min(PAGE_SIZE, limit - ids.length);
      const response = await this.request(
        `/user/repos?per_page=${perPage}&page=${page}&sort=full_name&affiliation=owner`
      );
      const data = await this.expectOk(response, "Listing repositories");

      if (!Array.isArray(data) || data.length === 0) break;

      for (const item of data) {
        const repo = toRepoPayload(item);
        if (repo && ids.length < limit) ids.push(repo.full_name);
      }

      if (data.length < perPage) break;
      page += 1;
    }

    return ids;
  }

  getViewer(): Promise<string | null> {
    if (!this.viewer) {
      const pending = this.fetchViewer();
      this.viewer = pending;
      // A failed lookup is not cached; the next caller asks again
      void pending.catch(() => {
        if (this.viewer === pending) this.viewer = undefined;
      });
    }
    return this.viewer;
  }

  private async fetchViewer(): Promise<string | null> {
    if (!this.token) return null;

    const response = await this.request("/user");
    if (!response.ok) return null;

    const data: unknown = await response.json();
    return isRecord(data) && typeof data.login === "string" ? data.login : null;
  }

  async repoExists(id: string): Promise<boolean> {
    const { owner, name } = parseRepoId(id);
    const response = await this.request(`/repos/${owner}/${name}`);

    if (response.ok) return true;
    if (response.status === 404) return false;

    throw new GitHubApiError(
      `Checking ${id} failed: ${response.status} ${response.statusText}`.trim(),
      response.status
    );
  }

  async getRepoMetadata(id: string): Promise<RepoMetadata | null> {
    const { owner, name } = parseRepoId(id);
    const response = await this.request(`/repos/${owner}/${name}`);
    if (!response.ok) return null;

    const repo = toRepoPayload(await response.json());
    if (!repo) return null;

    return {
      name: repo.name,
      fullName: repo.full_name,
      description: repo.description,
      language: repo.language,
      stars: repo.stargazers_count,
      forks: repo.forks_count,
      updatedAt: repo.updated_at,
      archived: repo.archived,
      private: repo.private,
      defaultBranch: repo.default_branch,
    };
  }

  async syncFork(id: string, branch: string): Promise<void> {
    const { owner, name } = parseRepoId(id);
    const response = await this.request(`/repos/${owner}/${name}/merge-upstream`, {
      method: "POST",
      body: JSON.stringify({ branch }),
    });
    await this.expectOk(response, `Syncing ${id} with upstream`);
  }
}

export function createGitHubProvider(token: string | undefined): SourceControlProvider {
  return new GitHubProvider({ token });
}
