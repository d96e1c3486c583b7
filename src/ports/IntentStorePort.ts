import type { IntentRecord } from '../core/intents/types.js';

export interface StoredRegistry {
  version: number;
  records: IntentRecord[];
  updatedAt: number;
}

export interface RegistryVersionSource {
  version: number;
  records: readonly IntentRecord[];
}

/** Durable backing store for the published intent configuration. */
export interface IntentStorePort {
  load(): StoredRegistry | null;
  /** Returns false when the store already holds this version or a newer one. */
  save(registry: RegistryVersionSource): boolean;
  getVersion(): number | null;
}
