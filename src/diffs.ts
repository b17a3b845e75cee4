import { isDeepStrictEqual } from 'node:util';
import { ROW_FIELDS, type CollectionRow } from './types/index.js';
import type { DirectusGateway } from './utils/directus.js';

export type DiffChangeType = 'created' | 'updated' | 'deleted';

export interface DiffEntry {
  entityType: string;
  entityId: string;
  changeType: DiffChangeType;
  diff: Record<string, unknown>;
}

export interface DiffSummary {
  created: number;
  updated: number;
  deleted: number;
  unchanged: number;
}

export interface DiffWriterOptions {
  collection?: string;
  skip?: boolean;
  chunkSize?: number;
}

const ENTITY_TYPE = 'collection_row';
const DEFAULT_COLLECTION = 'sync_diffs';
const DEFAULT_CHUNK_SIZE = 100;

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) throw new Error('chunk size must be greater than zero');
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

function pickFields<T extends object>(source: T | undefined, fields: readonly (keyof T)[]) {
  const result: Record<string, unknown> = {};
  if (!source) return result;
  for (const field of fields) {
    if (Object.prototype.hasOwnProperty.call(source, field)) {
      result[String(field)] = source[field];
    }
  }
  return result;
}

export function computeDiff<T extends object>(
  before: T | undefined,
  after: T | undefined,
  fields: readonly (keyof T)[]
): Record<string, unknown> | null {
  if (!before && after) {
    return { after: pickFields(after, fields) };
  }
  if (before && !after) {
    return { before: pickFields(before, fields) };
  }
  if (!before || !after) {
    return null;
  }

  const changes: Record<string, { before: unknown; after: unknown }> = {};
  for (const field of fields) {
    const prev = before[field];
    const next = after[field];
    if (!isDeepStrictEqual(prev, next)) {
      changes[String(field)] = { before: prev ?? null, after: next ?? null };
    }
  }

  return Object.keys(changes).length ? changes : null;
}

/**
 * Keys rows by release id. A collection may hold several copies of one release, so
 * repeats get an occurrence suffix in listing order: `123`, `123#2`, `123#3`.
 */
export function keyRows(rows: readonly CollectionRow[]): Map<string, CollectionRow> {
  const keyed = new Map<string, CollectionRow>();
  const occurrences = new Map<number, number>();
  for (const row of rows) {
    const occurrence = (occurrences.get(row.release_id) ?? 0) + 1;
    occurrences.set(row.release_id, occurrence);
    keyed.set(occurrence === 1 ? String(row.release_id) : `${row.release_id}#${occurrence}`, row);
  }
  return keyed;
}

export function diffKeyedRows(
  previous: ReadonlyMap<string, CollectionRow>,
  current: ReadonlyMap<string, CollectionRow>
): DiffEntry[] {
  const entries: DiffEntry[] = [];

  for (const [key, row] of current) {
    const before = previous.get(key);
    const diff = computeDiff(before, row, ROW_FIELDS);
    if (!diff) continue;
    entries.push({
      entityType: ENTITY_TYPE,
      entityId: key,
      changeType: before ? 'updated' : 'created',
      diff
    });
  }

  for (const [key, row] of previous) {
    if (current.has(key)) continue;
    const diff = computeDiff(row, undefined, ROW_FIELDS);
    if (!diff) continue;
    entries.push({ entityType: ENTITY_TYPE, entityId: key, changeType: 'deleted', diff });
  }

  return entries;
}

export function diffRows(previous: readonly CollectionRow[], current: readonly CollectionRow[]): DiffEntry[] {
  return diffKeyedRows(keyRows(previous), keyRows(current));
}

export function summarizeDiff(entries: readonly DiffEntry[], currentCount: number): DiffSummary {
  const summary: DiffSummary = { created: 0, updated: 0, deleted: 0, unchanged: 0 };
  for (const entry of entries) {
    summary[entry.changeType]++;
  }
  summary.unchanged = currentCount - summary.created - summary.updated;
  return summary;
}

export class DiffWriter {
  private readonly collection: string;
  private readonly chunkSize: number;
  private readonly skip: boolean;
  private readonly entries: DiffEntry[] = [];

  constructor(
    private readonly gateway: DirectusGateway,
    options: DiffWriterOptions = {}
  ) {
    this.collection = options.collection ?? DEFAULT_COLLECTION;
    this.skip = Boolean(options.skip);
    this.chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  }

  addChange(entry: DiffEntry): boolean {
    if (this.skip) return false;
    if (!Object.keys(entry.diff).length) return false;
    this.entries.push(entry);
    return true;
  }

  async flush(runId: string | undefined): Promise<void> {
    if (this.skip || !this.entries.length) return;
    const nowIso = new Date().toISOString();
    for (const batch of chunk(this.entries, this.chunkSize)) {
      await this.gateway.createMany(this.collection, batch.map((entry) => ({
        sync_run: runId ?? null,
        entity_type: entry.entityType,
        entity_id: entry.entityId,
        change_type: entry.changeType,
        diff: entry.diff,
        date_created: nowIso
      })));
    }
    this.entries.length = 0;
  }
}
