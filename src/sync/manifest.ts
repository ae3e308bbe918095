import * as fs from 'fs';
import { createJob } from '../scheduler/jobs';
import { RemoteFileDescriptor } from '../scheduler/types';
import { HttpRangeSource, HttpRangeSourceOptions } from '../sources/HttpRangeSource';
import { ObjectReader, S3RangeSource } from '../sources/S3RangeSource';
import { ByteRangeSource } from '../sources/types';

export interface ManifestOptions extends HttpRangeSourceOptions {
  // Client for s3:// URLs, created on first use when absent
  s3?: ObjectReader;
}

/**
 * Read a course manifest and turn every listed file into a job. `https://`
 * URLs are fetched with range requests, `s3://bucket/key` URLs through S3.
 *
 * ```json
 * { "courses": [{ "id": "c1", "name": "Algebra", "files": [{ "name": "a.pdf", "url": "https://...", "size": 1024 }] }] }
 * ```
 */
export async function readManifest(
  manifestPath: string,
  options: ManifestOptions = {}
): Promise<RemoteFileDescriptor[]> {
  const raw = await fs.promises.readFile(manifestPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Manifest ${manifestPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseManifest(parsed, options);
}

export function parseManifest(manifest: unknown, options: ManifestOptions = {}): RemoteFileDescriptor[] {
  const courses = readArray(manifest, 'courses', 'manifest');
  const jobs: RemoteFileDescriptor[] = [];
  let s3 = options.s3;

  const createSource = (url: string): ByteRangeSource => {
    if (url.startsWith('s3://')) {
      s3 ??= S3RangeSource.createClient();
      return S3RangeSource.fromPath(s3, url);
    }
    return new HttpRangeSource(url, { headers: options.headers });
  };

  courses.forEach((rawCourse, courseIndex) => {
    const where = `courses[${courseIndex}]`;
    const course = {
      id: readString(rawCourse, 'id', where),
      name: readString(rawCourse, 'name', where)
    };

    readArray(rawCourse, 'files', where).forEach((rawFile, fileIndex) => {
      const fileWhere = `${where}.files[${fileIndex}]`;
      const size: unknown = readField(rawFile, 'size', fileWhere);
      let declaredSize: number | undefined;
      if (typeof size === 'number') {
        declaredSize = size;
      } else if (size !== undefined) {
        throw new Error(`Manifest ${fileWhere}.size must be a number`);
      }

      jobs.push(createJob({
        course,
        displayName: readString(rawFile, 'name', fileWhere),
        declaredSize,
        source: createSource(readString(rawFile, 'url', fileWhere))
      }));
    });
  });

  return jobs;
}

function readField(value: unknown, key: string, where: string): unknown {
  if (typeof value !== 'object' || value === null) {
    throw new Error(`Manifest ${where} must be an object`);
  }
  return Reflect.get(value, key);
}

function readString(value: unknown, key: string, where: string): string {
  const field = readField(value, key, where);
  if (typeof field !== 'string' || field.trim() === '') {
    throw new Error(`Manifest ${where}.${key} must be a non-empty string`);
  }
  return field;
}

function readArray(value: unknown, key: string, where: string): unknown[] {
  const field = readField(value, key, where);
  if (!Array.isArray(field)) {
    throw new Error(`Manifest ${where}.${key} must be an array`);
  }
  return field;
}
