import { readFile } from 'node:fs/promises';
import type { ClassificationEngine } from '../classification/ClassificationEngine.js';
import type {
  ClassificationDecision,
  IntentRecord,
  ValidationIssue,
  ValidationReport,
} from '../intents/types.js';
import { parseIntentPayload } from '../ingestion/intentPayload.js';
import { normalizeRows } from '../ingestion/rowNormalizer.js';
import type { SheetRow } from '../ingestion/rowNormalizer.js';
import type { IntentStorePort, StoredRegistry } from '../../ports/IntentStorePort.js';
import { RegistryBootstrapError, StoreError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { failureReport } from './HotReloadManager.js';
import type {
  ActivationResult,
  HotReloadManager,
  MergeResult,
  SnapshotCommit,
  ValidationMode,
} from './HotReloadManager.js';
import type { RegistrySnapshot } from './RegistrySnapshot.js';

export interface IntentRegistryServiceOptions {
  /** Separator of list-valued spreadsheet columns. */
  listDelimiter: string;
  /** JSON file of intent payloads used when the store holds nothing yet. */
  seedPath?: string;
  /** Times an update is re-applied after the store moved ahead of this process. */
  maxStoreAttempts?: number;
}

export interface RegistryHealth {
  status: 'ok' | 'unavailable';
  version: number;
  intentCount: number;
  staged: boolean;
}

function structuralReport(errors: ValidationIssue[]): ValidationReport {
  return { valid: false, errors, warnings: [] };
}

/** Boundary operations of the intent registry, as used by the HTTP layer and the sync job. */
export class IntentRegistryService {
  private readonly logger = createLogger({ component: 'IntentRegistryService' });
  private readonly maxStoreAttempts: number;

  constructor(
    private readonly manager: HotReloadManager,
    private readonly engine: ClassificationEngine,
    private readonly store: IntentStorePort,
    private readonly options: IntentRegistryServiceOptions
  ) {
    this.maxStoreAttempts = options.maxStoreAttempts ?? 3;
  }

  /**
   * Publishes the first snapshot: stored configuration if any, otherwise the seed file.
   * Throws RegistryBootstrapError when neither yields a valid registry.
   */
  async initialize(): Promise<RegistrySnapshot> {
    let stored: StoredRegistry | null;
    try {
      stored = this.store.load();
    } catch (error) {
      throw new RegistryBootstrapError('Intent configuration store is unreachable', undefined, { cause: error });
    }

    if (stored) {
      this.logger.info({ version: stored.version, intents: stored.records.length }, 'Loading stored configuration');
      return this.manager.bootstrap(stored.records, stored.version);
    }

    const { seedPath } = this.options;
    if (!seedPath) {
      throw new RegistryBootstrapError('Intent configuration store is empty and no seed file is configured');
    }

    this.logger.info({ seedPath }, 'Store is empty; loading seed configuration');
    const records = await this.readSeed(seedPath);
    const snapshot = this.manager.bootstrap(records, 1);
    if (!this.commit(snapshot)) {
      const seeded = this.store.load();
      if (seeded) {
        this.logger.info({ version: seeded.version }, 'Store was seeded by another process; using its configuration');
        return this.manager.bootstrap(seeded.records, seeded.version);
      }
    }
    return snapshot;
  }

  stageBulk(rows: readonly SheetRow[]): ValidationReport {
    const { records, errors } = normalizeRows(rows, { listDelimiter: this.options.listDelimiter });
    if (errors.length > 0) {
      this.manager.discardStaged();
      this.logger.warn({ errors: errors.length, rows: rows.length }, 'Bulk upload has malformed rows; nothing staged');
      return structuralReport(errors);
    }
    return this.manager.stage(records);
  }

  /** A staged set validated against an older version than the store holds comes back stale. */
  activateStaged(): ActivationResult {
    try {
      this.syncFromStore();
      const result = this.manager.activateStaged(this.commit);
      if (result.failure === 'stale') {
        this.syncFromStore();
      }
      return result;
    } catch (error) {
      if (error instanceof StoreError) {
        return this.storeFailure(error);
      }
      throw error;
    }
  }

  applySingle(payload: unknown): MergeResult {
    const parsed = parseIntentPayload(payload);
    if (!parsed.ok) {
      return {
        success: false,
        version: this.manager.version,
        report: structuralReport(parsed.errors),
        failure: 'invalid',
      };
    }
    const { record } = parsed;
    return this.update((commit) => this.manager.applyMerge(record, commit));
  }

  removeIntent(intentId: string): MergeResult {
    return this.update((commit) => this.manager.applyRemoval(intentId, commit));
  }

  classify(utterance: string): ClassificationDecision {
    return this.engine.classify(utterance, this.manager.current());
  }

  /** Dry run over the given payloads, or over the active configuration when none are given. */
  validateOnly(payloads?: readonly unknown[], mode: ValidationMode = 'replace'): ValidationReport {
    if (payloads === undefined) {
      return this.manager.validateOnly(null);
    }

    const records: IntentRecord[] = [];
    const errors: ValidationIssue[] = [];
    payloads.forEach((payload, index) => {
      const parsed = parseIntentPayload(payload, index);
      if (parsed.ok) {
        records.push(parsed.record);
      } else {
        errors.push(...parsed.errors);
      }
    });
    if (errors.length > 0) {
      return structuralReport(errors);
    }
    return this.manager.validateOnly(records, mode);
  }

  listIntents(): { version: number; intents: readonly IntentRecord[] } {
    const snapshot = this.manager.current();
    return { version: snapshot.version, intents: snapshot.records };
  }

  getIntent(intentId: string): IntentRecord | undefined {
    return this.manager.current().get(intentId);
  }

  health(): RegistryHealth {
    if (!this.manager.hasSnapshot()) {
      return { status: 'unavailable', version: 0, intentCount: 0, staged: false };
    }
    const snapshot = this.manager.current();
    return {
      status: 'ok',
      version: snapshot.version,
      intentCount: snapshot.size,
      staged: this.manager.getStaged() !== null,
    };
  }

  /** Adopts a newer configuration written to the store by another process. */
  syncFromStore(): boolean {
    let stored: StoredRegistry | null;
    try {
      const storedVersion = this.store.getVersion();
      if (storedVersion === null || storedVersion <= this.manager.version) {
        return false;
      }
      stored = this.store.load();
    } catch (error) {
      throw new StoreError('Failed to read the intent configuration store', { cause: error });
    }
    if (!stored) return false;

    const report = this.manager.adopt(stored.records, stored.version);
    if (report?.valid) {
      this.logger.info({ version: stored.version }, 'Adopted newer stored configuration');
      return true;
    }
    return false;
  }

  private async readSeed(seedPath: string): Promise<IntentRecord[]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(seedPath, 'utf8'));
    } catch (error) {
      throw new RegistryBootstrapError(`Could not read seed file ${seedPath}`, undefined, { cause: error });
    }
    if (!Array.isArray(parsed)) {
      throw new RegistryBootstrapError(`Seed file ${seedPath} must contain a JSON array of intents`);
    }

    const records: IntentRecord[] = [];
    const errors: ValidationIssue[] = [];
    parsed.forEach((payload: unknown, index) => {
      const result = parseIntentPayload(payload, index);
      if (result.ok) {
        records.push(result.record);
      } else {
        errors.push(...result.errors);
      }
    });
    if (errors.length > 0) {
      throw new RegistryBootstrapError(`Seed file ${seedPath} has malformed intents`, structuralReport(errors));
    }
    return records;
  }

  /**
   * Catches up with the store, then applies the update with the store write as part of
   * publication. When another process wrote a newer version in between, re-syncs and
   * applies the update again on top of it.
   */
  private update(apply: (commit: SnapshotCommit) => MergeResult): MergeResult {
    let result: MergeResult | null = null;
    try {
      for (let attempt = 1; attempt <= this.maxStoreAttempts; attempt++) {
        this.syncFromStore();
        result = apply(this.commit);
        if (result.failure !== 'store-conflict') {
          return result;
        }
        this.logger.warn({ attempt, version: this.manager.version }, 'Store moved ahead during update; retrying');
      }
      this.syncFromStore();
    } catch (error) {
      if (error instanceof StoreError) {
        return this.storeFailure(error);
      }
      throw error;
    }
    return (
      result ?? {
        success: false,
        version: this.manager.version,
        report: failureReport('Update was not attempted'),
        failure: 'store-conflict',
      }
    );
  }

  private storeFailure(error: StoreError): MergeResult {
    this.logger.error({ error, version: this.manager.version }, 'Intent configuration store failed; update not applied');
    return {
      success: false,
      version: this.manager.version,
      report: failureReport(`${error.message}; the change was not applied`),
      failure: 'store-error',
    };
  }

  /** Store write performed before a snapshot becomes active. */
  private readonly commit: SnapshotCommit = (snapshot) => {
    let written: boolean;
    try {
      written = this.store.save(snapshot);
    } catch (error) {
      throw new StoreError(`Failed to persist registry version ${snapshot.version}`, { cause: error });
    }
    this.logger.debug({ version: snapshot.version, written }, 'Registry snapshot committed');
    return written;
  };
}
