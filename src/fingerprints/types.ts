import { Fingerprint } from '../fingerprint/types';

export interface FingerprintRecordDetails {
  displayName?: string;
  localPath?: string;
}

export interface FingerprintRecord extends FingerprintRecordDetails {
  courseId: string;
  fingerprint: Fingerprint;
  recordedAt: Date;
}

/**
 * Durable storage behind the known-fingerprint index
 */
export interface FingerprintStore {
  initialize(): Promise<void>;
  loadCourse(courseId: string): Promise<Fingerprint[]>;
  // Resolves once the entry is durable; false when it was already present
  insert(courseId: string, fingerprint: Fingerprint, details?: FingerprintRecordDetails): Promise<boolean>;
  listRecords(courseId: string): Promise<FingerprintRecord[]>;
  close(): Promise<void>;
}
