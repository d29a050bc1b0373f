import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { existsSync, readFileSync } from 'node:fs';
import type { Group, Settings } from '../types/index.js';
import { normalizeSettings } from './schema.js';

/**
 * Default values for a run
 */
export const DEFAULTS = {
  concurrency: 5,
  listLimit: 1000,
  configFileName: 'REPO-GROUPS.md',
  reposDirName: 'repos',
  defaultBranch: 'main',
  upstreamRemote: 'upstream',
  originRemote: 'origin',
};

/**
 * Get the config directory (for config.json)
 * Uses REPO_GROUPS_CONFIG_DIR if set, otherwise XDG_CONFIG_HOME/repo-groups, otherwise ~/.config/repo-groups
 */
export function getConfigDir(): string {
  if (process.env.REPO_GROUPS_CONFIG_DIR) {
    return process.env.REPO_GROUPS_CONFIG_DIR;
  }

  const xdgConfig = process.env.XDG_CONFIG_HOME;
  return xdgConfig ? join(xdgConfig, 'repo-groups') : join(homedir(), '.config', 'repo-groups');
}

function getSettingsPath(): string {
  return join(getConfigDir(), 'config.json');
}

export interface LoadedSettings {
  settings: Settings;
  issues: string[];
}

/**
 * Read config.json, dropping anything it does not understand
 */
export function loadSettings(): LoadedSettings {
  const settingsPath = getSettingsPath();
  if (!existsSync(settingsPath)) return { settings: {}, issues: [] };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(settingsPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { settings: {}, issues: [`${settingsPath} ignored: ${message}`] };
  }

  const normalized = normalizeSettings(raw);
  return { settings: normalized.data, issues: normalized.issues };
}

/**
 * Get the mirror root from the flag, environment, settings, or the current directory
 */
export function getRootDir(flag: string | undefined, settings: Settings): string {
  if (flag) return resolve(flag);
  if (process.env.REPO_GROUPS_ROOT) return resolve(process.env.REPO_GROUPS_ROOT);
  if (settings.root) return resolve(settings.root);

  return process.cwd();
}

/**
 * Get the grouping document path
 */
export function getCatalogPath(
  flag: string | undefined,
  root: string,
  settings: Settings
): string {
  if (flag) return resolve(flag);
  if (process.env.REPO_GROUPS_CONFIG) return resolve(process.env.REPO_GROUPS_CONFIG);
  if (settings.configFile) return resolve(root, settings.configFile);

  return join(root, DEFAULTS.configFileName);
}

export function getGitHubToken(): string | undefined {
  return process.env.GITHUB_TOKEN || process.env.GH_TOKEN || undefined;
}

/**
 * Directory name for a group: "<name>" or "<name> (<tag>)"
 */
export function getGroupFolderName(group: Group): string {
  return group.tag ? `${group.name} (${group.tag})` : group.name;
}

export function getGroupDir(root: string, group: Group): string {
  return join(root, DEFAULTS.reposDirName, getGroupFolderName(group));
}

/**
 * Where a repository lives inside its group
 */
export function getRepoPath(root: string, group: Group, shortName: string): string {
  return join(getGroupDir(root, group), shortName);
}

/**
 * Deprecated flat layout: <root>/<short-name>
 */
export function getLegacyRepoPath(root: string, shortName: string): string {
  return join(root, shortName);
}
