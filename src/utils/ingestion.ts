import type { DiffSummary } from '../diffs.js';
import type { ExtractResult } from '../extract.js';
import type { LoadResult } from '../load.js';
import type { DirectusGateway } from './directus.js';
import { log } from './log.js';

export type SyncRunState = 'running' | 'success' | 'failed';

export interface SyncStats {
  total: number;
  processed: number;
  skipped: number;
  enrichment_failures: number;
  rows: number | null;
  diff: DiffSummary | null;
}

export interface SyncRunContext {
  username: string;
  folderId: number;
}

const RUNS_COLLECTION = 'sync_runs';

function describeFailure(error: unknown): string {
  if (error instanceof Error) return error.stack ?? error.message;
  return String(error);
}

/**
 * One collection pass recorded as a `sync_runs` item. Extract totals land when the
 * fetch finishes, row count and diff summary when the sink has loaded.
 */
export class SyncRun {
  private runId?: string;
  private stats: SyncStats = {
    total: 0,
    processed: 0,
    skipped: 0,
    enrichment_failures: 0,
    rows: null,
    diff: null
  };

  constructor(
    private readonly gateway: DirectusGateway,
    private readonly collection = RUNS_COLLECTION
  ) {}

  get id(): string | undefined {
    return this.runId;
  }

  async start(context: SyncRunContext): Promise<void> {
    if (this.runId) return;
    const created = await this.gateway.createOne(this.collection, {
      state: 'running' satisfies SyncRunState,
      username: context.username,
      folder_id: context.folderId,
      stats_json: this.stats,
      started_at: new Date().toISOString()
    });
    this.runId = String(created.id);
    log.info('Sync run started', { sync_run_id: this.runId, username: context.username });
  }

  async recordExtract(result: ExtractResult): Promise<void> {
    this.stats = {
      ...this.stats,
      total: result.total,
      processed: result.processed,
      skipped: result.skipped,
      enrichment_failures: result.enrichmentFailures
    };
    await this.patch({ stats_json: this.stats });
  }

  async recordLoad(result: LoadResult): Promise<void> {
    this.stats = { ...this.stats, rows: result.count, diff: result.diff };
    await this.patch({ stats_json: this.stats, destination: result.destination });
  }

  async finish(): Promise<void> {
    await this.close('success', null);
    log.info('Sync run finished', { sync_run_id: this.runId, stats: this.stats });
  }

  async fail(error: unknown): Promise<void> {
    await this.close('failed', describeFailure(error));
    log.error('Sync run failed', { sync_run_id: this.runId, err: error });
  }

  private async close(state: SyncRunState, failure: string | null): Promise<void> {
    await this.patch({ state, stats_json: this.stats, log: failure, finished_at: new Date().toISOString() });
  }

  private async patch(changes: Record<string, unknown>): Promise<void> {
    if (!this.runId) return;
    await this.gateway.updateOne(this.collection, this.runId, changes);
  }
}
