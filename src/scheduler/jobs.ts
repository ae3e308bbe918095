import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { normalizeExtension } from '../policy/ExtensionPolicy';
import { ByteRangeSource } from '../sources/types';
import { Course, RemoteFileDescriptor } from './types';

export interface JobInput {
  id?: string;
  course: Course;
  displayName: string;
  extension?: string;
  declaredSize?: number;
  source: ByteRangeSource;
}

export function createJob(input: JobInput): RemoteFileDescriptor {
  if (!input.displayName.trim()) {
    throw new Error('A job needs a display name');
  }
  if (input.declaredSize !== undefined && (!Number.isFinite(input.declaredSize) || input.declaredSize < 0)) {
    throw new Error(`Invalid declared size for ${input.displayName}: ${input.declaredSize}`);
  }

  const extension = normalizeExtension(input.extension ?? path.extname(input.displayName));

  return Object.freeze({
    id: input.id ?? uuidv4(),
    course: Object.freeze({ ...input.course }),
    displayName: input.displayName,
    extension,
    declaredSize: input.declaredSize,
    source: input.source
  });
}
