import { extractCollection, type CollectionSource, type ExtractResult } from './extract.js';
import type { LoadResult, RowSink } from './load.js';
import { validateCollectionRows } from './validate.js';
import type { SyncConfig } from './config/sync.js';
import type { SyncRun } from './utils/ingestion.js';
import { log } from './utils/log.js';

/** The slice of `SyncRun` the driver needs. */
export type RunTracker = Pick<SyncRun, 'id' | 'start' | 'recordExtract' | 'recordLoad' | 'finish' | 'fail'>;

export interface SyncDependencies {
  source: CollectionSource;
  sink: RowSink;
  runTracker?: RunTracker;
  sleep?: (ms: number) => Promise<unknown>;
  schemaDir?: string;
}

export interface SyncResult {
  extract: ExtractResult;
  load: LoadResult;
}

export type SyncOptions = Pick<
  SyncConfig,
  | 'username'
  | 'folderId'
  | 'perPage'
  | 'requestDelayMs'
  | 'includeFullRelease'
  | 'progressInterval'
  | 'extraColumns'
  | 'table'
  | 'skipDiffs'
>;

export function reportLoad(result: LoadResult): void {
  log.info(`Loaded ${result.count} rows into ${result.destination}`, { diff: result.diff });
  log.info('Preview', { rows: result.preview });
}

export async function runSync(options: SyncOptions, deps: SyncDependencies): Promise<SyncResult> {
  const tracker = deps.runTracker;
  await tracker?.start({ username: options.username, folderId: options.folderId });

  try {
    const extract = await extractCollection(deps.source, { ...options, sleep: deps.sleep });
    await tracker?.recordExtract(extract);

    await validateCollectionRows(extract.rows, deps.schemaDir);

    const load = await deps.sink.load(extract.rows, {
      username: options.username,
      table: options.table,
      skipDiffs: options.skipDiffs,
      runId: tracker?.id
    });
    reportLoad(load);
    log.info(`fetched ${extract.rows.length} rows`);

    await tracker?.recordLoad(load);
    await tracker?.finish();

    return { extract, load };
  } catch (error) {
    await tracker?.fail(error);
    throw error;
  }
}
