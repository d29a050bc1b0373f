import type { Settings } from '../types/index.js';
import { DEFAULTS } from './config.js';

const MIN_WORKERS = 1;
const MAX_WORKERS = 32;

/** Where the worker count came from */
export type ConcurrencySource = '--concurrency' | 'PARALLEL_JOBS' | 'config.json' | 'default';

export interface ConcurrencySetting {
  value: number;
  source: ConcurrencySource;
  warning?: string;
}

/**
 * Coerce a raw worker count into 1..32. Unusable input falls back to the
 * default with a warning naming its source.
 */
export function normalizeConcurrency(
  input: unknown,
  source: ConcurrencySource = '--concurrency'
): ConcurrencySetting {
  const fallback = DEFAULTS.concurrency;

  if (input === undefined || input === null || input === '') {
    return { value: fallback, source: 'default' };
  }

  const raw = typeof input === 'number' ? input : Number(String(input).trim());
  if (!Number.isFinite(raw) || raw <= 0) {
    return {
      value: fallback,
      source: 'default',
      warning: `${source} must be a positive number, got "${String(input)}"; using ${fallback}.`,
    };
  }

  const whole = Math.max(MIN_WORKERS, Math.floor(raw));
  if (whole > MAX_WORKERS) {
    return { value: MAX_WORKERS, source, warning: `${source} capped at ${MAX_WORKERS}.` };
  }

  if (whole !== raw) {
    return { value: whole, source, warning: `${source} must be a whole number; using ${whole}.` };
  }

  return { value: whole, source };
}

/**
 * Flag, then PARALLEL_JOBS, then config.json, then the default
 */
export function resolveConcurrency(
  flag: string | undefined,
  settings: Settings
): ConcurrencySetting {
  if (flag !== undefined && flag !== '') {
    return normalizeConcurrency(flag, '--concurrency');
  }

  const fromEnv = process.env.PARALLEL_JOBS;
  if (fromEnv) {
    return normalizeConcurrency(fromEnv, 'PARALLEL_JOBS');
  }

  if (settings.concurrency !== undefined) {
    return normalizeConcurrency(settings.concurrency, 'config.json');
  }

  return { value: DEFAULTS.concurrency, source: 'default' };
}
