import type { IntentRecord, RegistrySettings, ValidationReport } from '../intents/types.js';
import type { ValidationEngine } from '../validation/ValidationEngine.js';
import { mergeRecords } from '../validation/ValidationEngine.js';
import { RegistrySnapshot } from './RegistrySnapshot.js';
import { RegistryBootstrapError, RegistryUnavailableError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export interface StagedConfiguration {
  records: readonly IntentRecord[];
  /** Active version the set was validated against; activation requires it to still be active. */
  baseVersion: number;
  report: ValidationReport;
  stagedAt: Date;
}

/** Why an update was refused; absent on success. */
export type UpdateFailure =
  | 'invalid'
  | 'nothing-staged'
  | 'stale'
  | 'contention'
  | 'store-conflict'
  | 'store-error';

export interface ActivationResult {
  success: boolean;
  version: number;
  report: ValidationReport | null;
  failure?: UpdateFailure;
}

export interface MergeResult {
  success: boolean;
  version: number;
  report: ValidationReport;
  failure?: UpdateFailure;
}

/**
 * Writes a snapshot to durable storage before it becomes active. Returns false when the
 * store already holds that version or a newer one; the snapshot is then not published.
 */
export type SnapshotCommit = (snapshot: RegistrySnapshot) => boolean;

type PublishOutcome =
  | { published: true; snapshot: RegistrySnapshot }
  | { published: false; failure: 'contention' | 'store-conflict' };

export type ValidationMode = 'replace' | 'merge';

export function failureReport(message: string, intentId: string | null = null): ValidationReport {
  return { valid: false, errors: [{ intentId, field: null, message }], warnings: [] };
}

/**
 * Owns the active snapshot and the staged slot. The active snapshot only ever changes
 * through publish(), a version compare, an optional commit to the store, then a single
 * reference assignment, so readers of current() see either the old or the new snapshot
 * and never a mix.
 */
export class HotReloadManager {
  private readonly logger = createLogger({ component: 'HotReloadManager' });
  private active: RegistrySnapshot | null = null;
  private staged: StagedConfiguration | null = null;

  constructor(
    private readonly validator: ValidationEngine,
    private readonly settings: RegistrySettings,
    private readonly maxPublishAttempts = 3
  ) {}

  current(): RegistrySnapshot {
    if (!this.active) {
      throw new RegistryUnavailableError();
    }
    return this.active;
  }

  get version(): number {
    return this.active?.version ?? 0;
  }

  hasSnapshot(): boolean {
    return this.active !== null;
  }

  getStaged(): StagedConfiguration | null {
    return this.staged;
  }

  bootstrap(records: readonly IntentRecord[], version = 1): RegistrySnapshot {
    const report = this.validator.validate(records, null);
    if (!report.valid) {
      throw new RegistryBootstrapError(
        `Initial intent configuration is invalid (${report.errors.length} error(s))`,
        report
      );
    }
    const snapshot = new RegistrySnapshot(version, records, this.settings);
    this.active = snapshot;
    this.logger.info({ version, intents: snapshot.size, warnings: report.warnings.length }, 'Registry bootstrapped');
    return snapshot;
  }

  stage(records: readonly IntentRecord[]): ValidationReport {
    const report = this.validator.validate(records, null);
    if (!report.valid) {
      this.staged = null;
      this.logger.warn({ errors: report.errors.length }, 'Staging rejected');
      return report;
    }
    this.staged = { records: [...records], baseVersion: this.version, report, stagedAt: new Date() };
    this.logger.info({ intents: records.length, baseVersion: this.version }, 'Configuration staged');
    return report;
  }

  discardStaged(): void {
    this.staged = null;
  }

  activateStaged(commit?: SnapshotCommit): ActivationResult {
    const staged = this.staged;
    if (!staged) {
      return {
        success: false,
        version: this.version,
        report: failureReport('Nothing is staged; upload a configuration before reloading'),
        failure: 'nothing-staged',
      };
    }
    this.staged = null;

    const outcome = this.publish(staged.records, staged.baseVersion, staged.baseVersion + 1, commit);
    if (outcome.published) {
      return { success: true, version: outcome.snapshot.version, report: null };
    }
    if (outcome.failure === 'store-conflict') {
      this.logger.warn({ baseVersion: staged.baseVersion }, 'Store holds a newer configuration; staged set dropped');
      return {
        success: false,
        version: this.version,
        report: failureReport(
          `Staged configuration was validated against version ${staged.baseVersion} but the store already holds a newer version; stage it again`
        ),
        failure: 'stale',
      };
    }
    this.logger.warn({ baseVersion: staged.baseVersion, version: this.version }, 'Staged configuration is stale');
    return {
      success: false,
      version: this.version,
      report: failureReport(
        `Staged configuration was validated against version ${staged.baseVersion} but version ${this.version} is now active; stage it again`
      ),
      failure: 'stale',
    };
  }

  applyMerge(record: IntentRecord, commit?: SnapshotCommit): MergeResult {
    return this.merge([record], [], commit);
  }

  applyRemoval(intentId: string, commit?: SnapshotCommit): MergeResult {
    return this.merge([], [intentId], commit);
  }

  /** Dry run: validates candidates (or the active set when null) without touching any state. */
  validateOnly(records: readonly IntentRecord[] | null, mode: ValidationMode = 'replace'): ValidationReport {
    if (records === null) {
      return this.validator.validate(this.current().records, null);
    }
    return this.validator.validate(records, mode === 'merge' ? this.current() : null);
  }

  /** Publishes a configuration read back from the store when it is newer than the active one. */
  adopt(records: readonly IntentRecord[], version: number): ValidationReport | null {
    if (version <= this.version) return null;
    const report = this.validator.validate(records, null);
    if (!report.valid) {
      this.logger.error({ version, errors: report.errors }, 'Stored configuration failed validation; not adopted');
      return report;
    }
    this.publish(records, this.version, version);
    return report;
  }

  /**
   * Merges run synchronously, so the version compare in publish() only trips when something
   * re-entrant (a validator or commit that ends up in adopt()) published in between. A store
   * that already holds a newer version is not retried here; the caller re-syncs and retries.
   */
  private merge(
    candidates: readonly IntentRecord[],
    removeIds: readonly string[],
    commit?: SnapshotCommit
  ): MergeResult {
    for (let attempt = 1; attempt <= this.maxPublishAttempts; attempt++) {
      const base = this.current();
      const report = this.validator.validate(candidates, base, { removeIds });
      if (!report.valid) {
        return { success: false, version: base.version, report, failure: 'invalid' };
      }
      const outcome = this.publish(
        mergeRecords(base.records, candidates, removeIds),
        base.version,
        base.version + 1,
        commit
      );
      if (outcome.published) {
        return { success: true, version: outcome.snapshot.version, report };
      }
      if (outcome.failure === 'store-conflict') {
        return {
          success: false,
          version: this.version,
          report: failureReport(`The store already holds a version newer than ${base.version}`),
          failure: 'store-conflict',
        };
      }
      this.logger.warn({ attempt, baseVersion: base.version }, 'Registry changed during merge; retrying');
    }
    return {
      success: false,
      version: this.version,
      report: failureReport(`Registry kept changing; merge abandoned after ${this.maxPublishAttempts} attempts`),
      failure: 'contention',
    };
  }

  private publish(
    records: readonly IntentRecord[],
    expectedVersion: number,
    nextVersion = expectedVersion + 1,
    commit?: SnapshotCommit
  ): PublishOutcome {
    if (this.version !== expectedVersion) {
      return { published: false, failure: 'contention' };
    }
    const snapshot = new RegistrySnapshot(nextVersion, records, this.settings);
    if (commit && !commit(snapshot)) {
      return { published: false, failure: 'store-conflict' };
    }
    this.active = snapshot;
    this.logger.info({ version: snapshot.version, intents: snapshot.size }, 'Registry snapshot published');
    return { published: true, snapshot };
  }
}
