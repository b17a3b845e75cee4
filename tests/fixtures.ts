import { vi } from 'vitest';
import type { CollectionRow } from '../src/types/index.js';
import type { DirectusGateway, DirectusRow } from '../src/utils/directus.js';

export function makeRow(releaseId: number, overrides: Partial<CollectionRow> = {}): CollectionRow {
  return {
    release_id: releaseId,
    master_id: null,
    artist: 'Artist',
    title: `Title ${releaseId}`,
    date_added: '',
    variant: '',
    format: 'CD',
    release_date: '',
    country: '',
    label: '',
    catno: '',
    genres: '',
    styles: '',
    ...overrides
  };
}

/** In-memory stand-in for a Directus instance; items get sequential string ids per collection. */
export function createFakeGateway(seed: Record<string, DirectusRow[]> = {}) {
  const collections = new Map<string, DirectusRow[]>();
  for (const [name, rows] of Object.entries(seed)) {
    collections.set(name, rows.map((row) => ({ ...row })));
  }
  let nextId = 1000;

  const rowsOf = (collection: string): DirectusRow[] => {
    const rows = collections.get(collection) ?? [];
    collections.set(collection, rows);
    return rows;
  };

  const gateway = {
    readByQuery: vi.fn<DirectusGateway['readByQuery']>(async (collection, query) => {
      let rows = rowsOf(collection);
      const username = query.filter?.username;
      if (username && typeof username === 'object' && '_eq' in username) {
        rows = rows.filter((row) => row.username === username._eq);
      }
      const offset = query.offset ?? 0;
      const limit = query.limit ?? rows.length;
      return rows.slice(offset, offset + limit).map((row) => ({ ...row }));
    }),
    createMany: vi.fn<DirectusGateway['createMany']>(async (collection, items) => {
      const created = items.map((item) => ({ ...item, id: String(nextId++) }));
      rowsOf(collection).push(...created);
      return created;
    }),
    createOne: vi.fn<DirectusGateway['createOne']>(async (collection, item) => {
      const created = { ...item, id: String(nextId++) };
      rowsOf(collection).push(created);
      return created;
    }),
    updateMany: vi.fn<DirectusGateway['updateMany']>(async (collection, items) => {
      const rows = rowsOf(collection);
      for (const item of items) {
        const index = rows.findIndex((row) => row.id === item.id);
        if (index >= 0) rows[index] = { ...rows[index], ...item };
      }
      return items;
    }),
    updateOne: vi.fn<DirectusGateway['updateOne']>(async (collection, key, item) => {
      const rows = rowsOf(collection);
      const index = rows.findIndex((row) => row.id === key);
      const updated = { ...(rows[index] ?? {}), ...item, id: key };
      if (index >= 0) rows[index] = updated;
      return updated;
    }),
    deleteMany: vi.fn<DirectusGateway['deleteMany']>(async (collection, keys) => {
      const remove = new Set<unknown>(keys);
      collections.set(
        collection,
        rowsOf(collection).filter((row) => !remove.has(row.id))
      );
    })
  } satisfies DirectusGateway;

  return { gateway, collections };
}
