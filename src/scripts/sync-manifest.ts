#!/usr/bin/env node

/**
 * Syncs every file listed in a course manifest into the download directory.
 *
 * Usage: sync-manifest <manifest.json>
 */

import * as path from 'path';
import { getSyncConfig, loadEnvironment } from '../config';
import { createSyncSession } from '../sync/SyncSession';
import { readManifest } from '../sync/manifest';
import { installSignalHandlers } from '../sync/signals';

async function syncManifest(manifestPath: string): Promise<number> {
  loadEnvironment();
  const config = getSyncConfig();
  const session = createSyncSession(config);
  const removeHandlers = installSignalHandlers(session);

  try {
    const jobs = await readManifest(manifestPath);
    console.log(`🔄 Syncing ${jobs.length} file(s) into ${config.downloadDirectory}`);
    const summary = await session.run(jobs);
    return summary.failed > 0 ? 1 : 0;
  } finally {
    removeHandlers();
    await session.close();
  }
}

if (require.main === module) {
  const manifestPath = process.argv[2];
  if (!manifestPath) {
    console.error('Usage: sync-manifest <manifest.json>');
    process.exit(2);
  }
  syncManifest(path.resolve(manifestPath))
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error('❌ Sync failed:', error);
      process.exit(1);
    });
}

export { syncManifest };
