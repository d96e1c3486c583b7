import { freezeRecord } from '../intents/IntentRecord.js';
import type { IntentRecord, RegistrySettings } from '../intents/types.js';

/** An immutable, versioned, fully validated set of intents. */
export class RegistrySnapshot {
  readonly records: readonly IntentRecord[];
  readonly settings: Readonly<RegistrySettings>;
  private readonly byId: ReadonlyMap<string, IntentRecord>;

  constructor(
    readonly version: number,
    records: readonly IntentRecord[],
    settings: RegistrySettings,
    readonly publishedAt: Date = new Date()
  ) {
    this.records = Object.freeze(records.map(freezeRecord));
    this.byId = new Map(this.records.map((record) => [record.intentId, record]));
    this.settings = Object.freeze({ ...settings, fallback: Object.freeze({ ...settings.fallback }) });
    Object.freeze(this);
  }

  get size(): number {
    return this.records.length;
  }

  get(intentId: string): IntentRecord | undefined {
    return this.byId.get(intentId);
  }

  thresholdFor(record: IntentRecord): number {
    return record.confidenceThreshold ?? this.settings.defaultConfidenceThreshold;
  }
}
