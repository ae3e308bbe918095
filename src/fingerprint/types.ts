/**
 * Lower-case hex SHA-256 digest of a policy window. Only equality is meaningful.
 */
export type Fingerprint = string;

export interface FingerprintDetails {
  fingerprint: Fingerprint;
  // Offset the hashed window actually started at (0 after a short-file fallback)
  offset: number;
  bytes: number;
  fellBack: boolean;
}
