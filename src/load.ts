import { join } from 'node:path';
import { readJsonIfExists, writeJsonFile } from './utils/fs.js';
import type { DirectusGateway, DirectusRow } from './utils/directus.js';
import { log } from './utils/log.js';
import { isRecord, readId, readText } from './lib/records.js';
import { DiffWriter, diffKeyedRows, keyRows, summarizeDiff, type DiffSummary } from './diffs.js';
import type { CollectionRow } from './types/index.js';

export interface LoadContext {
  username: string;
  table: string;
  skipDiffs?: boolean;
  runId?: string;
}

export interface LoadResult {
  destination: string;
  count: number;
  diff: DiffSummary | null;
  preview: CollectionRow[];
}

/** Where a finished pass goes. Rows arrive in listing order and must keep it. */
export interface RowSink {
  load(rows: readonly CollectionRow[], context: LoadContext): Promise<LoadResult>;
}

const PREVIEW_SIZE = 5;
const PAGE_LIMIT = 200;

function preview(rows: readonly CollectionRow[]): CollectionRow[] {
  return rows.slice(0, PREVIEW_SIZE);
}

/** Reads a row back from a snapshot file or a Directus item; undefined when it has no release id. */
export function readStoredRow(value: unknown): CollectionRow | undefined {
  if (!isRecord(value)) return undefined;
  const releaseId = readId(value.release_id);
  if (!releaseId) return undefined;

  const text = (field: string) => readText(value[field]) ?? '';
  const row: CollectionRow = {
    release_id: releaseId,
    master_id: readId(value.master_id) ?? null,
    artist: text('artist'),
    title: text('title'),
    date_added: text('date_added'),
    variant: text('variant'),
    format: text('format'),
    release_date: text('release_date'),
    country: text('country'),
    label: text('label'),
    catno: text('catno'),
    genres: text('genres'),
    styles: text('styles')
  };

  const barcode = readText(value.barcode);
  if (barcode !== undefined) row.barcode = barcode;
  const resourceUrl = readText(value.resource_url);
  if (resourceUrl !== undefined) row.resource_url = resourceUrl;

  return row;
}

function readStoredRows(value: unknown): CollectionRow[] {
  if (!Array.isArray(value)) return [];
  const rows: CollectionRow[] = [];
  for (const entry of value) {
    const row = readStoredRow(entry);
    if (row) rows.push(row);
  }
  return rows;
}

/** Writes the rows as a JSON snapshot, plus a diff against the snapshot it replaces. */
export class JsonFileSink implements RowSink {
  constructor(private readonly dataRoot: string) {}

  async load(rows: readonly CollectionRow[], context: LoadContext): Promise<LoadResult> {
    const dir = join(this.dataRoot, 'normalized', context.username);
    const file = join(dir, `${context.table}.json`);

    let diff: DiffSummary | null = null;
    if (!context.skipDiffs) {
      const previous = readStoredRows(await readJsonIfExists(file));
      const entries = diffKeyedRows(keyRows(previous), keyRows(rows));
      diff = summarizeDiff(entries, rows.length);
      await writeJsonFile(join(dir, `${context.table}.diff.json`), {
        generated_at: new Date().toISOString(),
        summary: diff,
        entries
      });
    }

    await writeJsonFile(file, rows);
    log.info('Collection snapshot written', { file, count: rows.length, diff });

    return { destination: file, count: rows.length, diff, preview: preview(rows) };
  }
}

export interface DirectusSinkOptions {
  diffCollection?: string;
}

interface StoredRow {
  id: string;
  row: CollectionRow;
}

/**
 * Mirrors the pass into a Directus collection. Items are scoped by `username` and
 * matched on `row_key` (the release id, suffixed for repeated copies).
 */
export class DirectusSink implements RowSink {
  constructor(
    private readonly gateway: DirectusGateway,
    private readonly options: DirectusSinkOptions = {}
  ) {}

  private async fetchAllRows(collection: string, username: string): Promise<DirectusRow[]> {
    const rows: DirectusRow[] = [];
    let offset = 0;
    while (true) {
      const batch = await this.gateway.readByQuery(collection, {
        fields: ['*'],
        filter: { username: { _eq: username } },
        limit: PAGE_LIMIT,
        offset
      });
      if (!batch.length) break;
      rows.push(...batch);
      if (batch.length < PAGE_LIMIT) break;
      offset += PAGE_LIMIT;
    }
    return rows;
  }

  private async readExisting(collection: string, username: string): Promise<Map<string, StoredRow>> {
    const existing = new Map<string, StoredRow>();
    for (const item of await this.fetchAllRows(collection, username)) {
      const id = readText(item.id);
      const key = readText(item.row_key);
      const row = readStoredRow(item);
      if (!id || !key || !row) {
        log.warn('Skipping stored row without id, row_key or release_id', { collection, id: item.id });
        continue;
      }
      existing.set(key, { id, row });
    }
    return existing;
  }

  async load(rows: readonly CollectionRow[], context: LoadContext): Promise<LoadResult> {
    const collection = context.table;
    const existing = await this.readExisting(collection, context.username);
    const previous = new Map<string, CollectionRow>();
    for (const [key, stored] of existing) {
      previous.set(key, stored.row);
    }
    const current = keyRows(rows);

    const entries = diffKeyedRows(previous, current);
    const diffWriter = new DiffWriter(this.gateway, {
      collection: this.options.diffCollection,
      skip: context.skipDiffs
    });

    const creates: DirectusRow[] = [];
    const updates: DirectusRow[] = [];
    const deletes: string[] = [];

    for (const entry of entries) {
      const stored = existing.get(entry.entityId);
      const row = current.get(entry.entityId);
      if (entry.changeType === 'deleted') {
        if (stored) deletes.push(stored.id);
      } else if (row) {
        const payload = { ...row, username: context.username, row_key: entry.entityId };
        if (entry.changeType === 'updated' && stored) {
          updates.push({ ...payload, id: stored.id });
        } else {
          creates.push(payload);
        }
      }
      diffWriter.addChange(entry);
    }

    // Directus has no transaction across these calls. Creates go last, so a failed pass
    // never leaves new rows next to stale ones; the run tracker records the error.
    await this.gateway.deleteMany(collection, deletes);
    await this.gateway.updateMany(collection, updates);
    await this.gateway.createMany(collection, creates);
    await diffWriter.flush(context.runId);

    const diff = summarizeDiff(entries, rows.length);
    log.info('Collection loaded into Directus', { collection, username: context.username, diff });

    return { destination: `directus:${collection}`, count: rows.length, diff, preview: preview(rows) };
  }
}
