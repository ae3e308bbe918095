import { createHash } from 'crypto';
import { CancelledError } from '../errors';
import { ExtensionPolicy } from '../policy/ExtensionPolicy';
import { ByteRangeSource } from '../sources/types';
import { Fingerprint, FingerprintDetails } from './types';

export const FINGERPRINT_ALGORITHM = 'sha256';

export function hashWindow(bytes: Buffer): Fingerprint {
  return createHash(FINGERPRINT_ALGORITHM).update(bytes).digest('hex');
}

/**
 * Computes content fingerprints from a small byte window of a file, so the
 * decision to skip a file never requires downloading it in full.
 */
export class FingerprintEngine {
  private policy: ExtensionPolicy;

  constructor(policy: ExtensionPolicy) {
    this.policy = policy;
  }

  async fingerprint(source: ByteRangeSource, extension: string, signal?: AbortSignal): Promise<Fingerprint> {
    const details = await this.inspect(source, extension, signal);
    return details.fingerprint;
  }

  /**
   * Same as `fingerprint`, but also reports which window was hashed
   */
  async inspect(source: ByteRangeSource, extension: string, signal?: AbortSignal): Promise<FingerprintDetails> {
    const { skip, read } = this.policy.policyFor(extension);

    throwIfAborted(signal);
    const window = await source.fetchRange(skip, read, signal);
    if (window.length >= read) {
      return {
        fingerprint: hashWindow(window.subarray(0, read)),
        offset: skip,
        bytes: read,
        fellBack: false
      };
    }

    // Shorter than skip + read: hash whatever the file holds from its start
    let fallback: Buffer;
    if (skip === 0) {
      fallback = window;
    } else {
      throwIfAborted(signal);
      fallback = await source.fetchRange(0, read, signal);
    }
    const bytes = fallback.subarray(0, read);

    return {
      fingerprint: hashWindow(bytes),
      offset: 0,
      bytes: bytes.length,
      fellBack: true
    };
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError('Fingerprinting cancelled');
  }
}
