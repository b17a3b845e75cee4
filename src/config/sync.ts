import { log } from '../utils/log.js';
import { EXTRA_COLUMNS, type ExtraColumn } from '../types/index.js';

export type SinkKind = 'json' | 'directus';

export interface DirectusConfig {
  url: string;
  token: string;
}

export interface SyncConfig {
  token: string;
  userAgent: string;
  username: string;
  folderId: number;
  perPage: number;
  requestDelayMs: number;
  includeFullRelease: boolean;
  progressInterval: number;
  extraColumns: ExtraColumn[];
  sink: SinkKind;
  dataRoot: string;
  table: string;
  skipDiffs: boolean;
  directus?: DirectusConfig;
}

type Env = Record<string, string | undefined>;

const DEFAULT_USER_AGENT = 'CollectionEtl/1.0';
const MAX_PER_PAGE = 100;

function isExtraColumn(value: string): value is ExtraColumn {
  return EXTRA_COLUMNS.some((column) => column === value);
}

export function parseExtraColumns(raw: string | undefined): ExtraColumn[] {
  if (!raw) return [];

  const candidates: string[] = [];
  const trimmed = raw.trim();

  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) {
        for (const entry of parsed) {
          if (typeof entry === 'string') {
            candidates.push(entry);
          } else if (entry !== null && entry !== undefined) {
            log.warn('Ignoring non-string EXTRA_COLUMNS entry from JSON payload', { entry });
          }
        }
      }
    } catch (error) {
      log.warn('Failed to parse EXTRA_COLUMNS as JSON array, falling back to CSV parsing', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  if (!candidates.length) {
    candidates.push(
      ...trimmed
        .split(/[,\s]+/)
        .map((token) => token.trim())
        .filter(Boolean)
    );
  }

  const columns: ExtraColumn[] = [];
  for (const candidate of candidates) {
    const column = candidate.toLowerCase();
    if (!isExtraColumn(column)) {
      throw new Error(`Unknown extra column "${candidate}"; expected one of ${EXTRA_COLUMNS.join(', ')}.`);
    }
    if (!columns.includes(column)) columns.push(column);
  }
  return columns;
}

export function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (!raw) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  log.warn('Unable to parse boolean env flag, falling back to default', {
    value: raw
  });
  return defaultValue;
}

export function parseCount(name: string, raw: string | undefined, defaultValue: number): number {
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}".`);
  }
  return value;
}

export function parseSink(raw: string | undefined): SinkKind {
  const normalized = (raw ?? 'json').trim().toLowerCase();
  if (normalized === 'json' || normalized === 'directus') return normalized;
  throw new Error(`SINK must be "json" or "directus", got "${raw}".`);
}

function required(name: string, value: string | undefined): string {
  if (!value || !value.trim()) {
    throw new Error(`${name} must be configured in environment variables or on the command line.`);
  }
  return value.trim();
}

/**
 * Builds the run configuration once. Explicit overrides (CLI flags) win over the environment,
 * which wins over defaults.
 */
export function loadSyncConfig(overrides: Partial<SyncConfig> = {}, env: Env = process.env): SyncConfig {
  const sink = overrides.sink ?? parseSink(env.SINK);

  const perPage = overrides.perPage ?? parseCount('DISCOGS_PER_PAGE', env.DISCOGS_PER_PAGE, MAX_PER_PAGE);
  if (perPage < 1 || perPage > MAX_PER_PAGE || !Number.isInteger(perPage)) {
    throw new Error(`DISCOGS_PER_PAGE must be an integer between 1 and ${MAX_PER_PAGE}.`);
  }

  const progressInterval =
    overrides.progressInterval ?? parseCount('PROGRESS_INTERVAL', env.PROGRESS_INTERVAL, 25);
  if (progressInterval < 1) {
    throw new Error('PROGRESS_INTERVAL must be at least 1.');
  }

  const directus =
    overrides.directus ??
    (sink === 'directus'
      ? {
          url: required('DIRECTUS_URL', env.DIRECTUS_URL),
          token: required('DIRECTUS_TOKEN', env.DIRECTUS_TOKEN)
        }
      : undefined);

  return {
    token: overrides.token ?? required('DISCOGS_TOKEN', env.DISCOGS_TOKEN),
    userAgent: overrides.userAgent ?? (env.USER_AGENT?.trim() || DEFAULT_USER_AGENT),
    username: overrides.username ?? required('DISCOGS_USERNAME', env.DISCOGS_USERNAME),
    folderId: overrides.folderId ?? parseCount('DISCOGS_FOLDER_ID', env.DISCOGS_FOLDER_ID, 0),
    perPage,
    requestDelayMs: overrides.requestDelayMs ?? parseCount('REQUEST_DELAY_MS', env.REQUEST_DELAY_MS, 250),
    includeFullRelease:
      overrides.includeFullRelease ?? parseBoolean(env.INCLUDE_FULL_RELEASE, true),
    progressInterval,
    extraColumns: overrides.extraColumns ?? parseExtraColumns(env.EXTRA_COLUMNS),
    sink,
    dataRoot: overrides.dataRoot ?? (env.DATA_ROOT?.trim() || './data'),
    table: overrides.table ?? (env.COLLECTION_TABLE?.trim() || 'collection'),
    skipDiffs: overrides.skipDiffs ?? parseBoolean(env.SKIP_DIFFS, false),
    directus
  };
}
