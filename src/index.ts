#!/usr/bin/env node
import 'dotenv/config';
import { parseCliArgs, resolveCliOverrides } from './cli.js';
import { loadSyncConfig, type SyncConfig } from './config/sync.js';
import { JsonFileSink, DirectusSink, type RowSink } from './load.js';
import { runSync, type RunTracker } from './pipeline.js';
import { createDirectusGateway } from './utils/directus.js';
import { DiscogsClient } from './utils/discogs.js';
import { SyncRun } from './utils/ingestion.js';
import { log } from './utils/log.js';

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', error);
  process.exit(1);
});

function createSink(config: SyncConfig): { sink: RowSink; runTracker?: RunTracker } {
  if (config.sink === 'directus' && config.directus) {
    const gateway = createDirectusGateway(config.directus);
    return { sink: new DirectusSink(gateway), runTracker: new SyncRun(gateway) };
  }
  return { sink: new JsonFileSink(config.dataRoot) };
}

async function main() {
  const overrides = resolveCliOverrides(parseCliArgs(process.argv.slice(2)));
  const config = loadSyncConfig(overrides);

  log.info('Collection sync configured', {
    username: config.username,
    folderId: config.folderId,
    sink: config.sink,
    includeFullRelease: config.includeFullRelease,
    extraColumns: config.extraColumns
  });

  const source = new DiscogsClient({ token: config.token, userAgent: config.userAgent });
  const { sink, runTracker } = createSink(config);

  await runSync(config, { source, sink, runTracker });
}

main().catch((error) => {
  log.error('Collection sync failed', error);
  process.exitCode = 1;
});
