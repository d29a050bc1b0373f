import type { SourceControlProvider } from "./github.js";
import { formatRepoId, shortNameOf } from "./repo-id.js";

/**
 * Short name → canonical id, built once from the provider's listing.
 *
 * The single-item fallback in `resolve` writes to the cache, so it is only
 * allowed while planning. `seal()` turns it into a plain lookup before the
 * execution waves start.
 */
export class RemoteIndex {
  private readonly byShortName = new Map<string, string>();
  private readonly ids = new Set<string>();
  private readonly collisionWarnings: string[] = [];
  private sealed = false;

  constructor(
    private readonly provider: SourceControlProvider,
    private readonly listLimit: number
  ) {}

  /**
   * Load up to `listLimit` ids. On a short-name collision the later id wins.
   */
  async bulkResolve(): Promise<number> {
    const listed = await this.provider.listRepos(this.listLimit);

    for (const id of listed) {
      this.add(id);
    }

    return this.byShortName.size;
  }

  private add(id: string): void {
    const shortName = shortNameOf(id);
    const previous = this.byShortName.get(shortName);

    if (previous !== undefined && previous !== id) {
      this.collisionWarnings.push(
        `"${shortName}" matches both ${previous} and ${id}; using ${id}`
      );
    }

    this.byShortName.set(shortName, id);
    this.ids.add(id);
  }

  /**
   * Cache first, then a probe of <viewer>/<shortName>
   */
  async resolve(shortName: string): Promise<string | undefined> {
    const cached = this.byShortName.get(shortName);
    if (cached !== undefined || this.sealed) return cached;

    const owner = await this.provider.getViewer();
    if (!owner) return undefined;

    const candidate = formatRepoId(owner, shortName);
    if (!(await this.provider.repoExists(candidate))) return undefined;

    this.add(candidate);
    return candidate;
  }

  lookup(shortName: string): string | undefined {
    return this.byShortName.get(shortName);
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.byShortName.size;
  }

  get warnings(): readonly string[] {
    return this.collisionWarnings;
  }
}
