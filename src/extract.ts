import { setTimeout as delay } from 'node:timers/promises';
import { parseCollectionItem, parseReleaseRecord } from './lib/records.js';
import { buildCollectionRow, resolveReleaseId, type RowOptions } from './transform.js';
import { isDiscogsTransportError } from './utils/discogs.js';
import { log } from './utils/log.js';
import type { CollectionFolder, CollectionRow, EnrichmentResult } from './types/index.js';

/** The slice of the Discogs API a sync pass needs; `DiscogsClient` implements it. */
export interface CollectionSource {
  getFolder(username: string, folderId: number): Promise<CollectionFolder>;
  collectionItems(username: string, folderId: number, perPage?: number): AsyncIterable<unknown>;
  getRelease(releaseId: number): Promise<unknown>;
}

export interface ExtractOptions extends RowOptions {
  username: string;
  folderId?: number;
  perPage?: number;
  /** Fixed pause before every listed item, whatever the outcome of the previous one. */
  requestDelayMs: number;
  includeFullRelease: boolean;
  progressInterval?: number;
  sleep?: (ms: number) => Promise<unknown>;
}

export interface ExtractResult {
  username: string;
  folder: CollectionFolder;
  total: number;
  processed: number;
  skipped: number;
  enrichmentFailures: number;
  rows: CollectionRow[];
}

const DEFAULT_PROGRESS_INTERVAL = 25;

async function fetchEnrichment(source: CollectionSource, releaseId: number): Promise<EnrichmentResult> {
  let raw: unknown;
  try {
    raw = await source.getRelease(releaseId);
  } catch (error) {
    if (!isDiscogsTransportError(error)) throw error;
    log.warn('Release detail fetch failed, falling back to collection data', {
      releaseId,
      error: error.message
    });
    return { status: 'failed', error: error.message };
  }
  return { status: 'ok', release: parseReleaseRecord(raw) };
}

export async function extractCollection(
  source: CollectionSource,
  options: ExtractOptions
): Promise<ExtractResult> {
  const folderId = options.folderId ?? 0;
  const progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  const sleep = options.sleep ?? delay;

  const folder = await source.getFolder(options.username, folderId);
  const total = folder.count;
  log.info('Collection sync started', { username: options.username, folder: folder.name, total });

  const rows: CollectionRow[] = [];
  let processed = 0;
  let skipped = 0;
  let enrichmentFailures = 0;

  for await (const raw of source.collectionItems(options.username, folderId, options.perPage)) {
    processed++;
    await sleep(options.requestDelayMs);

    const item = parseCollectionItem(raw);
    const releaseId = resolveReleaseId(item);
    if (!releaseId) {
      skipped++;
      continue;
    }

    const enrichment: EnrichmentResult = options.includeFullRelease
      ? await fetchEnrichment(source, releaseId)
      : { status: 'skipped' };
    if (enrichment.status === 'failed') enrichmentFailures++;

    rows.push(buildCollectionRow(releaseId, item, enrichment, options));

    if (processed % progressInterval === 0) {
      log.info(`Fetched ${processed}/${total}`, { processed, total, rows: rows.length });
    }
  }

  log.info('Collection fetch complete', {
    username: options.username,
    rows: rows.length,
    skipped,
    enrichmentFailures
  });

  return {
    username: options.username,
    folder,
    total,
    processed,
    skipped,
    enrichmentFailures,
    rows
  };
}
