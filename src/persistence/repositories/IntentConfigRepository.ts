import type { Database } from 'better-sqlite3';
import { z } from 'zod';
import { getDatabase } from '../database.js';
import type { IntentRecord } from '../../core/intents/types.js';
import type { IntentStorePort, RegistryVersionSource, StoredRegistry } from '../../ports/IntentStorePort.js';

type IntentRow = {
  intent_id: string;
  position: number;
  intent_name: string;
  category: string;
  agent_routing: string;
  priority: number;
  description_short: string;
  disambiguation_prompt: string | null;
  training_utterances: string;
  keywords: string;
  confidence_threshold: number | null;
};

type StateRow = {
  version: number;
  updated_at: number;
};

const stringList = z.array(z.string());

function rowToIntent(row: IntentRow): IntentRecord {
  const record: IntentRecord = {
    intentId: row.intent_id,
    intentName: row.intent_name,
    category: row.category,
    agentRouting: row.agent_routing,
    priority: row.priority,
    descriptionShort: row.description_short,
    trainingUtterances: stringList.parse(JSON.parse(row.training_utterances)),
    keywords: stringList.parse(JSON.parse(row.keywords)),
  };
  if (row.disambiguation_prompt !== null) record.disambiguationPrompt = row.disambiguation_prompt;
  if (row.confidence_threshold !== null) record.confidenceThreshold = row.confidence_threshold;
  return record;
}

export class IntentConfigRepository implements IntentStorePort {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  getVersion(): number | null {
    const row = this.db.prepare('SELECT version, updated_at FROM registry_state WHERE id = 1').get() as
      | StateRow
      | undefined;
    return row ? row.version : null;
  }

  load(): StoredRegistry | null {
    const state = this.db.prepare('SELECT version, updated_at FROM registry_state WHERE id = 1').get() as
      | StateRow
      | undefined;
    if (!state) return null;

    const rows = this.db.prepare('SELECT * FROM intents ORDER BY position ASC').all() as IntentRow[];
    return {
      version: state.version,
      records: rows.map((row) => rowToIntent(row)),
      updatedAt: state.updated_at,
    };
  }

  save(registry: RegistryVersionSource): boolean {
    const insert = this.db.prepare(`
      INSERT INTO intents (
        intent_id, position, intent_name, category, agent_routing, priority,
        description_short, disambiguation_prompt, training_utterances, keywords, confidence_threshold
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const write = this.db.transaction((source: RegistryVersionSource): boolean => {
      const current = this.getVersion();
      if (current !== null && current >= source.version) {
        return false;
      }

      this.db.prepare('DELETE FROM intents').run();
      source.records.forEach((record, position) => {
        insert.run(
          record.intentId,
          position,
          record.intentName,
          record.category,
          record.agentRouting,
          record.priority,
          record.descriptionShort,
          record.disambiguationPrompt ?? null,
          JSON.stringify(record.trainingUtterances),
          JSON.stringify(record.keywords),
          record.confidenceThreshold ?? null
        );
      });
      this.db
        .prepare(
          `INSERT INTO registry_state (id, version, updated_at) VALUES (1, ?, strftime('%s', 'now'))
           ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = strftime('%s', 'now')`
        )
        .run(source.version);
      return true;
    });

    // IMMEDIATE takes the write lock before the version check
    return write.immediate(registry);
  }
}
