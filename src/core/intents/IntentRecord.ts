import { z } from 'zod';
import type { IntentPayload, ValidationIssue } from './types.js';

export const INTENT_ID_PATTERN = /^INT-[A-Z][A-Z0-9]{1,5}-\d{4}$/;
export const DEFAULT_PRIORITY = 3;

function requiredText(field: string) {
  return z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .refine((value) => value.trim().length > 0, `${field} must not be empty`);
}

export const intentRecordSchema = z.object({
  intentId: z
    .string({ required_error: 'intent_id is required', invalid_type_error: 'intent_id must be a string' })
    .regex(INTENT_ID_PATTERN, 'intent_id must look like INT-<CATEGORY-CODE>-<4 digits>'),
  intentName: requiredText('intent_name'),
  category: requiredText('category'),
  agentRouting: requiredText('agent_routing'),
  priority: z
    .number({ required_error: 'priority is required', invalid_type_error: 'priority must be a number' })
    .int('priority must be an integer')
    .min(1, 'priority must be between 1 and 5')
    .max(5, 'priority must be between 1 and 5'),
  descriptionShort: requiredText('description_short'),
  trainingUtterances: z
    .array(requiredText('training utterance'), {
      required_error: 'training_utterances is required',
      invalid_type_error: 'training_utterances must be a list of strings',
    })
    .min(1, 'at least one training utterance is required'),
  keywords: z.array(z.string({ invalid_type_error: 'keywords must be strings' }), {
    invalid_type_error: 'keywords must be a list of strings',
  }),
  disambiguationPrompt: requiredText('disambiguation_prompt').optional(),
  confidenceThreshold: z
    .number({ invalid_type_error: 'confidence_threshold must be a number' })
    .gt(0, 'confidence_threshold must be greater than 0')
    .lte(1, 'confidence_threshold must be at most 1')
    .optional(),
});

export type IntentRecord = z.infer<typeof intentRecordSchema>;

const FIELD_NAMES: Record<keyof IntentRecord, string> = {
  intentId: 'intent_id',
  intentName: 'intent_name',
  category: 'category',
  agentRouting: 'agent_routing',
  priority: 'priority',
  descriptionShort: 'description_short',
  trainingUtterances: 'training_utterances',
  keywords: 'keywords',
  disambiguationPrompt: 'disambiguation_prompt',
  confidenceThreshold: 'confidence_threshold',
};

function isRecordField(key: string | number | undefined): key is keyof IntentRecord {
  return typeof key === 'string' && key in FIELD_NAMES;
}

export function payloadFieldName(key: string | number | undefined): string | null {
  if (isRecordField(key)) return FIELD_NAMES[key];
  return key === undefined ? null : String(key);
}

/**
 * Structural and format checks for a single record. Cross-record rules (uniqueness)
 * belong to the ValidationEngine.
 */
export function isWellFormed(record: unknown): ValidationIssue[] {
  const result = intentRecordSchema.safeParse(record);
  if (result.success) return [];

  const intentId =
    typeof record === 'object' && record !== null && 'intentId' in record && typeof record.intentId === 'string'
      ? record.intentId
      : null;

  return result.error.issues.map((issue) => ({
    intentId,
    field: payloadFieldName(issue.path[0]),
    message: issue.message,
  }));
}

/** Lowercase, trim and dedupe, keeping first-seen order. */
export function normalizeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const keyword of keywords) {
    const normalized = keyword.trim().toLowerCase().replace(/\s+/g, ' ');
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

/** Copy and deep-freeze so a published snapshot can never be mutated through a shared reference. */
export function freezeRecord(record: IntentRecord): IntentRecord {
  const copy: IntentRecord = {
    ...record,
    trainingUtterances: [...record.trainingUtterances],
    keywords: [...record.keywords],
  };
  Object.freeze(copy.trainingUtterances);
  Object.freeze(copy.keywords);
  return Object.freeze(copy);
}

export function toIntentPayload(record: IntentRecord): IntentPayload {
  const payload: IntentPayload = {
    intent_id: record.intentId,
    intent_name: record.intentName,
    category: record.category,
    agent_routing: record.agentRouting,
    priority: record.priority,
    description_short: record.descriptionShort,
    training_utterances: [...record.trainingUtterances],
    keywords: [...record.keywords],
  };
  if (record.disambiguationPrompt !== undefined) payload.disambiguation_prompt = record.disambiguationPrompt;
  if (record.confidenceThreshold !== undefined) payload.confidence_threshold = record.confidenceThreshold;
  return payload;
}
