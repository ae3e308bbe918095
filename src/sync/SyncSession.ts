import { SyncConfig } from '../config';
import { FingerprintEngine } from '../fingerprint/FingerprintEngine';
import { KnownFingerprintIndex } from '../fingerprints/KnownFingerprintIndex';
import { FileFingerprintStore } from '../fingerprints/FileFingerprintStore';
import { FingerprintStore } from '../fingerprints/types';
import { ExtensionPolicy } from '../policy/ExtensionPolicy';
import { ResultReporter, SyncSummary } from '../reporting/ResultReporter';
import { DownloadScheduler } from '../scheduler/DownloadScheduler';
import { DownloadThrottle } from '../scheduler/DownloadThrottle';
import { LocalFileWriter } from '../scheduler/LocalFileWriter';
import { EnumerationSource } from '../scheduler/types';

export interface SyncSessionOptions {
  // Replaces the index files, mainly for tests
  store?: FingerprintStore;
  policy?: ExtensionPolicy;
  writeRunLog?: boolean;
}

/**
 * One configured set of policy, index, writer, scheduler and reporter
 */
export class SyncSession {
  readonly config: SyncConfig;
  readonly policy: ExtensionPolicy;
  readonly engine: FingerprintEngine;
  readonly index: KnownFingerprintIndex;
  readonly writer: LocalFileWriter;
  readonly scheduler: DownloadScheduler;
  readonly reporter: ResultReporter;
  private writeRunLog: boolean;

  constructor(config: SyncConfig, options: SyncSessionOptions = {}) {
    this.config = config;
    this.policy = options.policy ?? ExtensionPolicy.fromFile(config.policyFile);
    this.engine = new FingerprintEngine(this.policy);
    this.index = new KnownFingerprintIndex(options.store ?? new FileFingerprintStore(config.indexDirectory));
    this.writer = new LocalFileWriter(
      config.downloadDirectory,
      config.downloadRate ? new DownloadThrottle(config.downloadRate) : null
    );
    this.scheduler = new DownloadScheduler(
      { engine: this.engine, index: this.index, writer: this.writer },
      config.scheduler
    );
    this.reporter = new ResultReporter();
    this.reporter.attach(this.scheduler);
    this.writeRunLog = options.writeRunLog ?? true;

    console.log(`Extension policy ${this.policy.signature()} loaded (${this.policy.extensions.length} extensions)`);
  }

  get isRunning(): boolean {
    return this.scheduler.isRunning;
  }

  async run(jobs: EnumerationSource): Promise<SyncSummary> {
    this.reporter.reset();
    await this.scheduler.run(jobs);

    this.reporter.printSummary();
    if (this.writeRunLog) {
      await this.reporter.appendRunLog(this.config.runLogPath);
    }
    return this.reporter.getSummary();
  }

  cancel(): void {
    this.scheduler.cancel();
  }

  async close(): Promise<void> {
    await this.index.close();
  }
}

export function createSyncSession(config: SyncConfig, options: SyncSessionOptions = {}): SyncSession {
  return new SyncSession(config, options);
}
