/**
 * Canonical repository ids ("owner/name")
 */

export interface ParsedRepoId {
  owner: string;
  name: string;
}

const SEGMENT = /^[A-Za-z0-9_.-]+$/;

/**
 * Parse a canonical id. Accepts "owner/name" and tolerates a trailing ".git"
 * or surrounding whitespace.
 */
export function parseRepoId(id: string): ParsedRepoId {
  const trimmed = id.trim();
  const segments = trimmed.split('/');

  if (segments.length !== 2) {
    throw new Error(`Invalid repository id: ${id}\nExpected owner/name`);
  }

  const [owner, rawName] = segments;
  const name = rawName.endsWith('.git') ? rawName.slice(0, -4) : rawName;

  if (!SEGMENT.test(owner) || !SEGMENT.test(name)) {
    throw new Error(`Invalid repository id: ${id}\nExpected owner/name`);
  }

  return { owner, name };
}

export function formatRepoId(owner: string, name: string): string {
  return `${owner}/${name}`;
}

/**
 * Trailing name component of a canonical id
 */
export function shortNameOf(id: string): string {
  const index = id.lastIndexOf('/');
  return index === -1 ? id : id.slice(index + 1);
}

export function isValidRepoId(id: string): boolean {
  try {
    parseRepoId(id);
    return true;
  } catch {
    return false;
  }
}

/**
 * HTTPS clone URL on GitHub
 */
export function toCloneUrl(id: string): string {
  const { owner, name } = parseRepoId(id);
  return `https://github.com/${owner}/${name}.git`;
}
