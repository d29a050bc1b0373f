import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import type { Catalog, Group } from "../types/index.js";

export class ConfigMissingError extends Error {
  constructor(public readonly path: string) {
    super(`Grouping document not found: ${path}`);
    this.name = "ConfigMissingError";
  }
}

export class EmptyCatalogError extends Error {
  constructor(public readonly path: string) {
    super(`No groups found in ${path}`);
    this.name = "EmptyCatalogError";
  }
}

export class GroupNotFoundError extends Error {
  constructor(public readonly inputs: string[]) {
    super(`No group matches ${inputs.map((input) => `"${input}"`).join(", ")}`);
    this.name = "GroupNotFoundError";
  }
}

const HEADING = /^##\s/;
const INLINE_COMMENT = /<!--\s*(.*?)\s*-->/;
const BULLET = /^\s*-\s*(.*?)\s*$/;
const NUMBERED_HIGHLAND = /^(\d+(?:\.\d+)?)高地$/;

/**
 * "3高地" → "3号高地"; anything else is returned as-is
 */
export function normalizeTag(tag: string): string {
  const match = tag.match(NUMBERED_HIGHLAND);
  return match ? `${match[1]}号高地` : tag;
}

function parseHeading(line: string): Group {
  const body = line.replace(/^##\s+/, "");
  const commentStart = body.indexOf("<!--");
  const name = (commentStart === -1 ? body : body.slice(0, commentStart)).trim();

  const comment = body.match(INLINE_COMMENT);
  const tag = comment && comment[1].length > 0 ? normalizeTag(comment[1]) : undefined;

  return tag ? { name, tag, repos: [] } : { name, repos: [] };
}

/**
 * Parse the grouping document into ordered groups.
 *
 * ```md
 * ## Tools <!-- 3高地 -->
 * - alpha
 * - beta
 * ```
 */
export function parseCatalog(text: string): Group[] {
  const groups: Group[] = [];
  let current: Group | undefined;

  for (const line of text.split(/\r?\n/)) {
    if (HEADING.test(line)) {
      current = parseHeading(line);
      if (current.name.length > 0) {
        groups.push(current);
      } else {
        current = undefined;
      }
      continue;
    }

    if (!current) continue;

    const bullet = line.match(BULLET);
    if (bullet && bullet[1].length > 0) {
      current.repos.push(bullet[1]);
    }
  }

  return groups;
}

/**
 * Read and parse the grouping document
 * Throws ConfigMissingError if it does not exist
 */
export async function loadCatalog(path: string): Promise<Catalog> {
  if (!existsSync(path)) {
    throw new ConfigMissingError(path);
  }

  const content = await readFile(path, "utf-8");
  return { path, groups: parseCatalog(content) };
}

/**
 * Exact name first, then the first case-insensitive substring match in
 * document order
 */
export function findGroupByFuzzyName(catalog: Catalog, input: string): Group | undefined {
  const exact = catalog.groups.find((group) => group.name === input);
  if (exact) return exact;

  const needle = input.toLowerCase();
  return catalog.groups.find((group) => group.name.toLowerCase().includes(needle));
}

/**
 * Resolve a list of fuzzy group names; unknown inputs are reported back
 */
export function selectGroups(
  catalog: Catalog,
  inputs: string[]
): { groups: Group[]; unknown: string[] } {
  if (inputs.length === 0) {
    return { groups: catalog.groups, unknown: [] };
  }

  const groups: Group[] = [];
  const unknown: string[] = [];

  for (const input of inputs) {
    const group = findGroupByFuzzyName(catalog, input);
    if (!group) {
      unknown.push(input);
    } else if (!groups.includes(group)) {
      groups.push(group);
    }
  }

  return { groups, unknown };
}

/**
 * Numbered listing: " 1. Tools (3号高地)"
 */
export function listGroups(catalog: Catalog): string[] {
  return catalog.groups.map((group, index) => {
    const number = String(index + 1).padStart(2, " ");
    return group.tag ? `${number}. ${group.name} (${group.tag})` : `${number}. ${group.name}`;
  });
}
