import { describe, it, expect } from "vitest";
import { normalizeSettings } from "../../src/lib/schema.js";

describe("normalizeSettings", () => {
  it("keeps valid settings untouched", () => {
    const normalized = normalizeSettings({
      root: "~/mirror",
      configFile: "GROUPS.md",
      concurrency: 8,
      listLimit: 500,
    });

    expect(normalized.data).toEqual({
      root: "~/mirror",
      configFile: "GROUPS.md",
      concurrency: 8,
      listLimit: 500,
    });
    expect(normalized.changed).toBe(false);
    expect(normalized.issues).toEqual([]);
  });

  it("drops unknown fields and invalid values", () => {
    const normalized = normalizeSettings({
      root: "  /srv/mirror  ",
      configFile: "",
      concurrency: 2.5,
      listLimit: -1,
      theme: "dark",
    });

    expect(normalized.data.root).toBe("/srv/mirror");
    expect(normalized.data.configFile).toBeUndefined();
    expect(normalized.data.concurrency).toBeUndefined();
    expect(normalized.data.listLimit).toBeUndefined();
    expect(normalized.changed).toBe(true);
    expect(normalized.issues).toEqual([
      'config.json dropped unknown field "theme"',
      "config.json dropped invalid configFile",
      "config.json dropped invalid concurrency",
      "config.json dropped invalid listLimit",
    ]);
  });

  it("ignores a value that is not an object", () => {
    const normalized = normalizeSettings(["root"]);

    expect(normalized.data).toEqual({});
    expect(normalized.issues).toEqual(["config.json is not an object; ignored"]);
  });
});
