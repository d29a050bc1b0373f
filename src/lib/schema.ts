import type { Settings } from '../types/index.js';

type NormalizationResult<T> = {
  data: T;
  changed: boolean;
  issues: string[];
};

const SETTINGS_KEYS = new Set(['root', 'configFile', 'concurrency', 'listLimit']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(
  raw: Record<string, unknown>,
  key: string,
  issues: string[]
): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value === 'string' && value.trim().length > 0) return value.trim();

  issues.push(`config.json dropped invalid ${key}`);
  return undefined;
}

function optionalPositiveInt(
  raw: Record<string, unknown>,
  key: string,
  issues: string[]
): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;

  issues.push(`config.json dropped invalid ${key}`);
  return undefined;
}

export function normalizeSettings(raw: unknown): NormalizationResult<Settings> {
  if (!isRecord(raw)) {
    return { data: {}, changed: true, issues: ['config.json is not an object; ignored'] };
  }

  const issues: string[] = [];

  for (const key of Object.keys(raw)) {
    if (!SETTINGS_KEYS.has(key)) {
      issues.push(`config.json dropped unknown field "${key}"`);
    }
  }

  const data: Settings = {
    root: optionalString(raw, 'root', issues),
    configFile: optionalString(raw, 'configFile', issues),
    concurrency: optionalPositiveInt(raw, 'concurrency', issues),
    listLimit: optionalPositiveInt(raw, 'listLimit', issues),
  };

  return { data, changed: issues.length > 0, issues };
}
