#!/usr/bin/env node

/**
 * Fingerprints the files already in the download directory and records them
 * in the index. Needed after editing the extension policy.
 *
 * Usage: rebuild-index <manifest.json>
 * Course directories are matched to manifest courses by their sanitized name.
 */

import * as fs from 'fs';
import * as path from 'path';
import { getSyncConfig, loadEnvironment } from '../config';
import { LocalIndexBuilder } from '../fingerprints/LocalIndexBuilder';
import { createSyncSession } from '../sync/SyncSession';
import { readManifest } from '../sync/manifest';

async function rebuildIndex(manifestPath: string): Promise<void> {
  loadEnvironment();
  const session = createSyncSession(getSyncConfig(), { writeRunLog: false });

  try {
    const jobs = await readManifest(manifestPath);
    const courses = new Map(jobs.map((job) => [job.course.id, job.course] as const));
    const builder = new LocalIndexBuilder(session.engine, session.index);

    let added = 0;
    let unreadable = 0;
    for (const course of courses.values()) {
      const directory = session.writer.courseDirectory({ course });
      if (!fs.existsSync(directory)) {
        console.log(`⏭️  No local files for ${course.name}`);
        continue;
      }
      const stats = await builder.rebuildCourse(course, directory);
      added += stats.added;
      unreadable += stats.skipped;
    }
    if (unreadable > 0) {
      console.warn(`⚠️  ${unreadable} file(s) could not be read and were left out`);
    }
    console.log(`✅ Index rebuilt, ${added} fingerprint(s) added`);
  } finally {
    await session.close();
  }
}

if (require.main === module) {
  const manifestPath = process.argv[2];
  if (!manifestPath) {
    console.error('Usage: rebuild-index <manifest.json>');
    process.exit(2);
  }
  rebuildIndex(path.resolve(manifestPath)).catch((error: unknown) => {
    console.error('❌ Index rebuild failed:', error);
    process.exit(1);
  });
}

export { rebuildIndex };
