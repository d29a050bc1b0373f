import { describe, it, expect } from "vitest";
import {
  formatRepoId,
  isValidRepoId,
  parseRepoId,
  shortNameOf,
  toCloneUrl,
} from "../../src/lib/repo-id.js";

describe("parseRepoId", () => {
  it("splits owner and name", () => {
    expect(parseRepoId("acme/alpha")).toEqual({ owner: "acme", name: "alpha" });
  });

  it("strips a .git suffix and whitespace", () => {
    expect(parseRepoId("  acme/alpha.git ")).toEqual({ owner: "acme", name: "alpha" });
  });

  it("accepts dots, dashes and underscores", () => {
    expect(parseRepoId("my-org/site.github.io_2")).toEqual({
      owner: "my-org",
      name: "site.github.io_2",
    });
  });

  it("throws on ids without exactly one slash", () => {
    expect(() => parseRepoId("alpha")).toThrow("Invalid repository id: alpha");
    expect(() => parseRepoId("a/b/c")).toThrow("Expected owner/name");
  });

  it("throws on characters GitHub does not allow", () => {
    expect(() => parseRepoId("acme/my repo")).toThrow("Invalid repository id");
  });
});

describe("repo id helpers", () => {
  it("formats and shortens ids", () => {
    expect(formatRepoId("acme", "alpha")).toBe("acme/alpha");
    expect(shortNameOf("acme/alpha")).toBe("alpha");
    expect(shortNameOf("alpha")).toBe("alpha");
  });

  it("validates ids", () => {
    expect(isValidRepoId("acme/alpha")).toBe(true);
    expect(isValidRepoId("acme/")).toBe(false);
  });

  it("builds the HTTPS clone URL", () => {
    expect(toCloneUrl("acme/alpha")).toBe("https://github.com/acme/alpha.git");
  });
});
