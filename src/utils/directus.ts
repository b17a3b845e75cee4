import {
  createDirectus,
  createItem,
  createItems,
  deleteItems,
  readItems,
  rest,
  staticToken,
  updateItem,
  updateItemsBatch,
  type Query
} from '@directus/sdk';
import { isRecord } from '../lib/records.js';
import type { DirectusConfig } from '../config/sync.js';

export type DirectusRow = Record<string, unknown>;
export type DirectusSchema = Record<string, DirectusRow[]>;
export type DirectusKey = string | number;

export interface DirectusQuery {
  fields?: string[];
  filter?: Record<string, unknown>;
  sort?: string[];
  limit?: number;
  offset?: number;
}

/** The handful of item operations the loader and run tracking use. */
export interface DirectusGateway {
  readByQuery(collection: string, query: DirectusQuery): Promise<DirectusRow[]>;
  createMany(collection: string, items: DirectusRow[]): Promise<DirectusRow[]>;
  createOne(collection: string, item: DirectusRow): Promise<DirectusRow>;
  updateMany(collection: string, items: DirectusRow[]): Promise<DirectusRow[]>;
  updateOne(collection: string, key: DirectusKey, item: DirectusRow): Promise<DirectusRow>;
  deleteMany(collection: string, keys: string[] | number[]): Promise<void>;
}

interface DirectusContext {
  action: string;
  collection: string;
}

export class DirectusRequestError extends Error {
  constructor(
    context: DirectusContext,
    public readonly status: number,
    public readonly body: unknown
  ) {
    super(`Directus ${context.action} for ${context.collection} failed with status ${status}`);
    this.name = 'DirectusRequestError';
  }
}

async function readResponseBody(response: Response): Promise<unknown> {
  if (response.bodyUsed) return undefined;
  const text = await response.text();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

// The SDK hands back the raw Response for some failures instead of rejecting.
async function unwrapDirectusResult(result: unknown, context: DirectusContext): Promise<unknown> {
  if (typeof Response !== 'undefined' && result instanceof Response) {
    throw new DirectusRequestError(context, result.status, await readResponseBody(result));
  }
  return result;
}

function toRows(result: unknown, context: DirectusContext): DirectusRow[] {
  if (result === null || result === undefined) return [];
  if (Array.isArray(result)) return result.filter(isRecord);
  if (isRecord(result)) {
    if ('data' in result) return toRows(result.data, context);
    return [result];
  }
  throw new Error(
    `Directus ${context.action} for ${context.collection} returned unexpected response type: ${typeof result}.`
  );
}

function toRow(result: unknown, context: DirectusContext): DirectusRow {
  const [row] = toRows(result, context);
  if (!row) {
    throw new Error(`Directus ${context.action} for ${context.collection} returned no item.`);
  }
  return row;
}

export function createDirectusGateway(config: DirectusConfig): DirectusGateway {
  const directus = createDirectus<DirectusSchema>(config.url)
    .with(staticToken(config.token))
    .with(rest());

  return {
    async readByQuery(collection, query) {
      const context = { action: 'readByQuery', collection };
      // Collections are only known at run time, so the SDK cannot type the filter fields.
      const sdkQuery = query as Query<DirectusSchema, DirectusRow>;
      const result: unknown = await directus.request(readItems(collection, sdkQuery));
      return toRows(await unwrapDirectusResult(result, context), context);
    },

    async createMany(collection, items) {
      if (!items.length) return [];
      const context = { action: 'createMany', collection };
      const result: unknown = await directus.request(createItems(collection, items));
      return toRows(await unwrapDirectusResult(result, context), context);
    },

    async createOne(collection, item) {
      const context = { action: 'createOne', collection };
      const result: unknown = await directus.request(createItem(collection, item));
      return toRow(await unwrapDirectusResult(result, context), context);
    },

    async updateMany(collection, items) {
      if (!items.length) return [];
      const context = { action: 'updateMany', collection };
      const result: unknown = await directus.request(updateItemsBatch(collection, items));
      return toRows(await unwrapDirectusResult(result, context), context);
    },

    async updateOne(collection, key, item) {
      const context = { action: 'updateOne', collection };
      const result: unknown = await directus.request(updateItem(collection, key, item));
      return toRow(await unwrapDirectusResult(result, context), context);
    },

    async deleteMany(collection, keys) {
      if (!keys.length) return;
      const context = { action: 'deleteMany', collection };
      const result: unknown = await directus.request(deleteItems(collection, keys));
      await unwrapDirectusResult(result, context);
    }
  };
}
