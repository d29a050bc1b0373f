import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { GitHubApiError, GitHubProvider } from "../../src/lib/github.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function repo(fullName: string, extra: Record<string, unknown> = {}) {
  return { name: fullName.split("/")[1], full_name: fullName, ...extra };
}

describe("GitHubProvider", () => {
  const fetchMock = vi.fn<[string, RequestInit?], Promise<Response>>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("listRepos", () => {
    it("requires a token", async () => {
      const provider = new GitHubProvider();

      await expect(provider.listRepos(10)).rejects.toBeInstanceOf(GitHubApiError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("pages until a short page and stops at the limit", async () => {
      const firstPage = Array.from({ length: 100 }, (_, i) => repo(`acme/r${i}`));
      fetchMock
        .mockResolvedValueOnce(jsonResponse(firstPage))
        .mockResolvedValueOnce(jsonResponse([repo("acme/last"), repo("other/tools")]));
      const provider = new GitHubProvider({ token: "test-secret" });

      const ids = await provider.listRepos(1000);

      expect(ids).toHaveLength(102);
      expect(ids.slice(-2)).toEqual(["acme/last", "other/tools"]);
      expect(fetchMock).toHaveBeenCalledTimes(2);

      const [url, init] = fetchMock.mock.calls[1];
      expect(url).toBe(
        "https://api.github.com/user/repos?per_page=100&page=2&sort=full_name&affiliation=owner"
      );
      expect(init?.headers).toMatchObject({ Authorization: "Bearer test-secret" });
    });

    it("asks only for what the limit allows", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([repo("acme/a"), repo("acme/b")]));
      const provider = new GitHubProvider({ token: "test-secret" });

      await expect(provider.listRepos(2)).resolves.toEqual(["acme/a", "acme/b"]);
      expect(fetchMock.mock.calls[0][0]).toContain("per_page=2&page=1");
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("fails on an error status", async () => {
      fetchMock.mockResolvedValueOnce(new Response("nope", { status: 401, statusText: "Unauthorized" }));
      const provider = new GitHubProvider({ token: "test-secret" });

      await expect(provider.listRepos(10)).rejects.toThrow(
        "Listing repositories failed: 401 Unauthorized"
      );
    });

    it("wraps network errors", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
      const provider = new GitHubProvider({ token: "test-secret" });

      const error = await provider.listRepos(10).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitHubApiError);
      expect(error).toMatchObject({ status: null });
    });
  });

  describe("getViewer", () => {
    it("returns the login once and memoizes it", async () => {
      fetchMock.mockResolvedValue(jsonResponse({ login: "acme" }));
      const provider = new GitHubProvider({ token: "test-secret" });

      expect(await provider.getViewer()).toBe("acme");
      expect(await provider.getViewer()).toBe("acme");
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("asks again after a failed lookup", async () => {
      fetchMock
        .mockRejectedValueOnce(new TypeError("fetch failed"))
        .mockResolvedValueOnce(jsonResponse({ login: "acme" }));
      const provider = new GitHubProvider({ token: "test-secret" });

      await expect(provider.getViewer()).rejects.toBeInstanceOf(GitHubApiError);
      expect(await provider.getViewer()).toBe("acme");
      expect(await provider.getViewer()).toBe("acme");
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("is null without a token", async () => {
      await expect(new GitHubProvider().getViewer()).resolves.toBeNull();
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe("repoExists", () => {
    it("is true on 200 and false on 404", async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse(repo("acme/alpha")))
        .mockResolvedValueOnce(jsonResponse({ message: "Not Found" }, 404));
      const provider = new GitHubProvider({ token: "test-secret" });

      expect(await provider.repoExists("acme/alpha")).toBe(true);
      expect(await provider.repoExists("acme/gone")).toBe(false);
      expect(fetchMock.mock.calls[1][0]).toBe("https://api.github.com/repos/acme/gone");
    });

    it("throws on anything else", async () => {
      fetchMock.mockResolvedValueOnce(new Response("", { status: 502, statusText: "Bad Gateway" }));
      const provider = new GitHubProvider({ token: "test-secret" });

      await expect(provider.repoExists("acme/alpha")).rejects.toMatchObject({
        message: "Checking acme/alpha failed: 502 Bad Gateway",
        status: 502,
      });
    });
  });

  describe("getRepoMetadata", () => {
    it("maps the payload", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(
          repo("acme/alpha", {
            description: "Alpha tools",
            language: "TypeScript",
            stargazers_count: 7,
            forks_count: 2,
            updated_at: "2026-01-01T00:00:00Z",
            default_branch: "trunk",
          })
        )
      );
      const provider = new GitHubProvider({ token: "test-secret" });

      await expect(provider.getRepoMetadata("acme/alpha")).resolves.toEqual({
        name: "alpha",
        fullName: "acme/alpha",
        description: "Alpha tools",
        language: "TypeScript",
        stars: 7,
        forks: 2,
        updatedAt: "2026-01-01T00:00:00Z",
        archived: false,
        private: false,
        defaultBranch: "trunk",
      });
    });

    it("is null when the repo cannot be read", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ message: "Not Found" }, 404));

      await expect(new GitHubProvider().getRepoMetadata("acme/gone")).resolves.toBeNull();
    });
  });

  describe("syncFork", () => {
    it("posts the branch to merge-upstream", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ merge_type: "fast-forward" }));
      const provider = new GitHubProvider({ token: "test-secret" });

      await provider.syncFork("acme/alpha", "main");

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe("https://api.github.com/repos/acme/alpha/merge-upstream");
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe(JSON.stringify({ branch: "main" }));
    });

    it("throws when the fork cannot be synced", async () => {
      fetchMock.mockResolvedValueOnce(new Response("", { status: 409, statusText: "Conflict" }));
      const provider = new GitHubProvider({ token: "test-secret" });

      await expect(provider.syncFork("acme/alpha", "main")).rejects.toThrow(
        "Syncing acme/alpha with upstream failed: 409 Conflict"
      );
    });
  });
});
