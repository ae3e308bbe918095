import * as fs from 'fs';
import * as path from 'path';
import { StorageError } from '../errors';
import { FingerprintEngine } from '../fingerprint/FingerprintEngine';
import { Fingerprint } from '../fingerprint/types';
import { LocalFileSource } from '../sources/LocalFileSource';
import { PARTIAL_SUFFIX } from '../scheduler/LocalFileWriter';
import { Course } from '../scheduler/types';
import { KnownFingerprintIndex } from './KnownFingerprintIndex';

export interface RebuildStats {
  scanned: number;
  added: number;
  alreadyKnown: number;
  // Files that could not be read
  skipped: number;
}

/**
 * Seeds the index from files already present in a course directory, so they
 * are skipped by the next sync instead of being downloaded again.
 */
export class LocalIndexBuilder {
  private engine: FingerprintEngine;
  private index: KnownFingerprintIndex;

  constructor(engine: FingerprintEngine, index: KnownFingerprintIndex) {
    this.engine = engine;
    this.index = index;
  }

  async rebuildCourse(course: Course, directory: string): Promise<RebuildStats> {
    const stats: RebuildStats = { scanned: 0, added: 0, alreadyKnown: 0, skipped: 0 };

    for (const filePath of await listFiles(directory)) {
      if (filePath.endsWith(PARTIAL_SUFFIX)) {
        continue;
      }

      let fingerprint: Fingerprint;
      try {
        fingerprint = await this.engine.fingerprint(new LocalFileSource(filePath), path.extname(filePath));
      } catch (error) {
        if (!(error instanceof StorageError)) {
          throw error;
        }
        console.warn(`Cannot read ${filePath}, skipping: ${error.message}`);
        stats.skipped++;
        continue;
      }
      stats.scanned++;

      const inserted = await this.index.insert(course.id, fingerprint, {
        displayName: path.basename(filePath),
        localPath: filePath
      });
      if (inserted) {
        stats.added++;
      } else {
        stats.alreadyKnown++;
      }
    }

    console.log(
      `Indexed ${course.name}: ${stats.added} added, ${stats.alreadyKnown} already known, ${stats.skipped} unreadable`
    );
    return stats;
  }
}

async function listFiles(directory: string): Promise<string[]> {
  const entries = await fs.promises.readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}
