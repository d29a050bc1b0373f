import { describe, it, expect, vi, afterEach } from "vitest";
import {
  buildDiffReport,
  formatDiffReport,
  formatFailureLedger,
  formatMissingRepo,
  formatProgressLine,
  formatStats,
  formatVerdict,
  truncateDescription,
} from "../../src/lib/report.js";
import type { FailureRecord, SyncTask } from "../../src/types/index.js";
import { makeMetadata } from "../fakes.js";

function makeTask(id: string, kind: SyncTask["kind"]): SyncTask {
  return {
    id,
    shortName: id.split("/")[1],
    group: "Tools",
    targetDir: `/mirror/repos/Tools/${id.split("/")[1]}`,
    kind,
    priority: kind === "clone" ? "high" : "low",
    attempts: 1,
  };
}

describe("buildDiffReport", () => {
  it("splits expected and local ids into synced, missing and extra", () => {
    const report = buildDiffReport(
      ["acme/a", "acme/b", "acme/c", "acme/a"],
      ["acme/a", "acme/c", "acme/x"],
      1
    );

    expect(report).toEqual({
      expected: ["acme/a", "acme/b", "acme/c"],
      local: ["acme/a", "acme/c", "acme/x"],
      synced: ["acme/a", "acme/c"],
      missing: ["acme/b"],
      extra: ["acme/x"],
      failed: 1,
      successRate: 66,
    });
  });

  it("has no success rate when nothing is expected", () => {
    expect(buildDiffReport([], ["acme/x"], 0).successRate).toBeNull();
  });
});

describe("formatDiffReport", () => {
  it("lists missing repos with details and a short list of extras", () => {
    const report = buildDiffReport(["acme/a", "acme/b"], ["acme/a", "acme/x"], 1);
    const metadata = new Map([
      [
        "acme/b",
        makeMetadata({ language: "TypeScript", stars: 12, description: "d".repeat(61) }),
      ],
    ]);

    expect(formatDiffReport(report, metadata)).toEqual([
      "Expected:     2",
      "Local:        2",
      "Synced:       1",
      "Missing:      1",
      "Extra:        1",
      "Failed:       1",
      "Success rate: 50%",
      "",
      "Missing repositories:",
      "- acme/b",
      "  TypeScript · ★ 12",
      `  ${"d".repeat(57)}...`,
      "",
      "Extra repositories:",
      "- acme/x",
    ]);
  });

  it("only counts extras when there are more than twenty", () => {
    const extras = Array.from({ length: 21 }, (_, i) => `acme/extra-${i}`);
    const report = buildDiffReport([], extras, 0);

    const lines = formatDiffReport(report);

    expect(lines).toContain("Success rate: n/a");
    expect(lines.at(-1)).toBe("Extra repositories: 21 (too many to list)");
    expect(lines).not.toContain("- acme/extra-0");
  });
});

describe("formatMissingRepo", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("prints only the id without metadata", () => {
    expect(formatMissingRepo("acme/b", null)).toEqual(["- acme/b"]);
  });

  it("omits zero stars and shows when the repo was last updated", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-26T00:00:00Z"));

    const lines = formatMissingRepo(
      "acme/b",
      makeMetadata({ language: "Go", updatedAt: "2026-01-23T00:00:00Z" })
    );

    expect(lines).toEqual(["- acme/b", "  Go · updated 3d ago"]);
  });
});

describe("truncateDescription", () => {
  it("keeps descriptions up to sixty characters", () => {
    expect(truncateDescription("x".repeat(60))).toBe("x".repeat(60));
    expect(truncateDescription("x".repeat(61))).toBe(`${"x".repeat(57)}...`);
  });
});

describe("formatFailureLedger", () => {
  it("numbers records and marks recovered tasks", () => {
    const records: FailureRecord[] = [
      { id: "acme/a", shortName: "a", group: "Tools", category: "clone", message: "network unreachable", attempt: 1 },
      { shortName: "beta", group: "Tools", category: "remote-unresolvable", message: "remote repository not found", attempt: 1 },
      { id: "acme/c", shortName: "c", group: "Tools", category: "update", message: "conflict", attempt: 2 },
    ];

    expect(formatFailureLedger(records, new Set(["acme/a"]))).toEqual([
      "1. [clone] acme/a: network unreachable [recovered on retry]",
      "2. [remote-unresolvable] beta: remote repository not found",
      "3. [update] acme/c (attempt 2): conflict",
    ]);
  });
});

describe("formatProgressLine", () => {
  it("shows position, outcome, task and duration", () => {
    expect(
      formatProgressLine(
        { task: makeTask("acme/alpha", "clone"), outcome: { status: "success" }, durationMs: 2100 },
        1,
        3
      )
    ).toBe("[1/3] ✓ clone acme/alpha (Tools) 2.1s");

    expect(
      formatProgressLine(
        {
          task: makeTask("acme/beta", "update"),
          outcome: { status: "failure", reason: "conflict" },
          durationMs: 40,
        },
        2,
        3
      )
    ).toBe("[2/3] ✗ update acme/beta (Tools) 0.0s: conflict");

    expect(
      formatProgressLine(
        {
          task: makeTask("acme/gamma", "clone"),
          outcome: { status: "skipped", reason: "already cloned" },
          durationMs: 0,
        },
        3,
        3
      )
    ).toBe("[3/3] ○ clone acme/gamma (Tools) 0.0s: already cloned");
  });
});

describe("summary lines", () => {
  it("formats run totals", () => {
    expect(formatStats({ added: 2, updated: 5, deleted: 1, failed: 0, skipped: 3 })).toEqual([
      "Added:   2",
      "Updated: 5",
      "Deleted: 1",
      "Failed:  0",
      "Skipped: 3",
    ]);
  });

  it("gives a verdict", () => {
    expect(formatVerdict(buildDiffReport(["acme/a"], ["acme/a"], 0))).toBe(
      "All expected repositories are synced"
    );
    expect(formatVerdict(buildDiffReport(["acme/a", "acme/b"], ["acme/a"], 1))).toBe(
      "1 missing, 1 failed"
    );
  });
});
