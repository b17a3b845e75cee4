import type { ReleaseRecord } from '../types/index.js';
import { cleanText } from './text.js';

/**
 * Truthiness as the collection data treats it: empty strings, zero, NaN, false,
 * empty lists and empty objects all count as "no value".
 */
export function isFilled(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return false;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return true;
}

/**
 * Prefers the full release value when it is filled, otherwise the basic value when the
 * basic record carries the field at all, otherwise `fallback`.
 *
 * An explicit empty value on the full release (`country: ""`) still falls through to the
 * basic record. Lists are taken whole from whichever record wins.
 */
export function pick<K extends keyof ReleaseRecord>(
  key: K,
  full: ReleaseRecord | undefined,
  basic: ReleaseRecord | undefined
): ReleaseRecord[K];
export function pick<K extends keyof ReleaseRecord, D>(
  key: K,
  full: ReleaseRecord | undefined,
  basic: ReleaseRecord | undefined,
  fallback: D
): NonNullable<ReleaseRecord[K]> | D;
export function pick(
  key: keyof ReleaseRecord,
  full: ReleaseRecord | undefined,
  basic: ReleaseRecord | undefined,
  fallback?: unknown
): unknown {
  const enriched = full?.[key];
  if (isFilled(enriched)) return enriched;
  const value = basic?.[key];
  return value !== undefined ? value : fallback;
}

export function resolveReleaseDate(
  full: ReleaseRecord | undefined,
  basic: ReleaseRecord | undefined
): string {
  const released = pick('released', full, basic);
  if (isFilled(released)) return cleanText(released);
  if (isFilled(basic?.released_formatted)) return cleanText(basic?.released_formatted);
  return cleanText(basic?.year);
}
