import { isWellFormed } from '../intents/IntentRecord.js';
import type { IntentRecord, ValidationIssue, ValidationReport } from '../intents/types.js';
import { contentTokens, diceCoefficient, jaccardIndex } from '../classification/textSimilarity.js';

export interface ValidationSettings {
  /** Records with fewer utterances than this get a warning. */
  minTrainingUtterances: number;
  /** Similarity at or above which two intents without a disambiguation prompt are flagged. */
  overlapWarningFloor: number;
}

export const DEFAULT_VALIDATION_SETTINGS: ValidationSettings = {
  minTrainingUtterances: 5,
  overlapWarningFloor: 0.8,
};

/** The part of a registry snapshot the engine needs when validating a merge. */
export interface ExistingRegistry {
  readonly records: readonly IntentRecord[];
}

export interface ValidateOptions {
  /** Ids to drop from the existing registry as part of a merge. */
  removeIds?: readonly string[];
}

function nameKey(record: IntentRecord): string {
  return `${record.category.trim().toLowerCase()}\u0000${record.intentName.trim().toLowerCase()}`;
}

/**
 * Existing records minus any replaced or removed id, with candidates replacing in place
 * and new ids appended.
 */
export function mergeRecords(
  existing: readonly IntentRecord[],
  candidates: readonly IntentRecord[],
  removeIds: readonly string[] = []
): IntentRecord[] {
  const replacements = new Map(candidates.map((record) => [record.intentId, record]));
  const removed = new Set(removeIds);
  const merged: IntentRecord[] = [];

  for (const record of existing) {
    if (removed.has(record.intentId)) continue;
    const replacement = replacements.get(record.intentId);
    if (replacement) {
      merged.push(replacement);
      replacements.delete(record.intentId);
    } else {
      merged.push(record);
    }
  }
  for (const record of candidates) {
    if (replacements.has(record.intentId)) merged.push(record);
  }
  return merged;
}

export class ValidationEngine {
  private readonly settings: ValidationSettings;

  constructor(settings: Partial<ValidationSettings> = {}) {
    this.settings = { ...DEFAULT_VALIDATION_SETTINGS, ...settings };
  }

  /**
   * Evaluates every rule and returns the complete report. Without `existing` the
   * candidates are a full replacement set; with it they are merged into that registry.
   */
  validate(
    candidates: readonly IntentRecord[],
    existing: ExistingRegistry | null,
    options: ValidateOptions = {}
  ): ValidationReport {
    const errors: ValidationIssue[] = [];
    const warnings: ValidationIssue[] = [];

    for (const record of candidates) {
      errors.push(...isWellFormed(record));
    }
    errors.push(...this.findDuplicateIds(candidates));
    errors.push(...this.findDuplicateNames(candidates));

    let resulting: readonly IntentRecord[] = candidates;
    if (existing) {
      const removeIds = options.removeIds ?? [];
      errors.push(...this.checkMerge(candidates, existing.records, removeIds));
      resulting = mergeRecords(existing.records, candidates, removeIds);
    }

    if (resulting.length === 0) {
      errors.push({ intentId: null, field: null, message: 'The registry must contain at least one intent' });
    }

    for (const record of candidates) {
      const utteranceCount = Array.isArray(record.trainingUtterances) ? record.trainingUtterances.length : 0;
      if (utteranceCount > 0 && utteranceCount < this.settings.minTrainingUtterances) {
        warnings.push({
          intentId: record.intentId,
          field: 'training_utterances',
          message: `Only ${utteranceCount} training utterance(s); at least ${this.settings.minTrainingUtterances} are recommended`,
        });
      }
    }
    warnings.push(...this.findOverlaps(candidates, resulting));

    return { valid: errors.length === 0, errors, warnings };
  }

  private findDuplicateIds(records: readonly IntentRecord[]): ValidationIssue[] {
    const counts = new Map<string, number>();
    for (const record of records) {
      counts.set(record.intentId, (counts.get(record.intentId) ?? 0) + 1);
    }
    const issues: ValidationIssue[] = [];
    for (const [intentId, count] of counts) {
      if (count > 1) {
        issues.push({ intentId, field: 'intent_id', message: `Duplicate intent_id ${intentId} appears ${count} times` });
      }
    }
    return issues;
  }

  private findDuplicateNames(records: readonly IntentRecord[]): ValidationIssue[] {
    const seen = new Map<string, IntentRecord>();
    const issues: ValidationIssue[] = [];
    for (const record of records) {
      if (typeof record.intentName !== 'string' || typeof record.category !== 'string') continue;
      const key = nameKey(record);
      const first = seen.get(key);
      if (!first) {
        seen.set(key, record);
        continue;
      }
      if (first.intentId === record.intentId) continue;
      issues.push({
        intentId: record.intentId,
        field: 'intent_name',
        message: `intent_name "${record.intentName}" is already used in category "${record.category}" by ${first.intentId}`,
      });
    }
    return issues;
  }

  private checkMerge(
    candidates: readonly IntentRecord[],
    existing: readonly IntentRecord[],
    removeIds: readonly string[]
  ): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const existingIds = new Set(existing.map((record) => record.intentId));
    for (const intentId of removeIds) {
      if (!existingIds.has(intentId)) {
        issues.push({ intentId, field: 'intent_id', message: `No intent with id ${intentId} is registered` });
      }
    }

    const replaced = new Set([...candidates.map((record) => record.intentId), ...removeIds]);
    const retained = new Map<string, IntentRecord>();
    for (const record of existing) {
      if (!replaced.has(record.intentId)) retained.set(nameKey(record), record);
    }
    for (const record of candidates) {
      if (typeof record.intentName !== 'string' || typeof record.category !== 'string') continue;
      const clash = retained.get(nameKey(record));
      if (clash) {
        issues.push({
          intentId: record.intentId,
          field: 'intent_name',
          message: `intent_name "${record.intentName}" is already used in category "${record.category}" by ${clash.intentId}`,
        });
      }
    }
    return issues;
  }

  private findOverlaps(candidates: readonly IntentRecord[], resulting: readonly IntentRecord[]): ValidationIssue[] {
    const floor = this.settings.overlapWarningFloor;
    const issues: ValidationIssue[] = [];

    for (const record of candidates) {
      if (record.disambiguationPrompt || !Array.isArray(record.trainingUtterances)) continue;
      const ownTokens = record.trainingUtterances.map(contentTokens);
      const ownKeywords = new Set(Array.isArray(record.keywords) ? record.keywords : []);

      for (const other of resulting) {
        if (other.intentId === record.intentId) continue;
        const keywordOverlap = jaccardIndex(ownKeywords, new Set(other.keywords));
        let utteranceOverlap = 0;
        for (const utterance of other.trainingUtterances) {
          const otherTokens = contentTokens(utterance);
          for (const tokens of ownTokens) {
            utteranceOverlap = Math.max(utteranceOverlap, diceCoefficient(tokens, otherTokens));
          }
        }
        const overlap = Math.max(keywordOverlap, utteranceOverlap);
        if (overlap >= floor) {
          issues.push({
            intentId: record.intentId,
            field: 'disambiguation_prompt',
            message: `Training data overlaps with ${other.intentId} (${other.intentName}) at ${overlap.toFixed(2)}; add a disambiguation_prompt`,
          });
        }
      }
    }
    return issues;
  }
}
