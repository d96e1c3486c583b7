import { z } from 'zod';
import { DEFAULT_PRIORITY, normalizeKeywords } from '../intents/IntentRecord.js';
import type { IntentRecord, ValidationIssue } from '../intents/types.js';

function text(field: string) {
  return z.string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` });
}

function textList(field: string) {
  return z.array(z.string({ invalid_type_error: `${field} entries must be strings` }), {
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a list of strings`,
  });
}

const blankToUndefined = (value: string | null | undefined): string | undefined =>
  value === null || value === undefined || value.trim() === '' ? undefined : value.trim();

/** Structural shape of a record submitted through the API or read from a seed file. */
export const intentPayloadSchema = z.object({
  intent_id: text('intent_id'),
  intent_name: text('intent_name'),
  category: text('category'),
  agent_routing: text('agent_routing'),
  priority: z.number({ invalid_type_error: 'priority must be a number' }).nullish(),
  description_short: text('description_short'),
  training_utterances: textList('training_utterances'),
  keywords: textList('keywords').nullish(),
  disambiguation_prompt: text('disambiguation_prompt').nullish(),
  confidence_threshold: z.number({ invalid_type_error: 'confidence_threshold must be a number' }).nullish(),
});

export type PayloadParseResult =
  | { ok: true; record: IntentRecord }
  | { ok: false; errors: ValidationIssue[] };

/**
 * Coerces an untyped payload into an IntentRecord. Only structure is checked here;
 * formats and ranges are the ValidationEngine's job.
 */
export function parseIntentPayload(payload: unknown, row?: number): PayloadParseResult {
  const result = intentPayloadSchema.safeParse(payload);
  if (!result.success) {
    const intentId =
      typeof payload === 'object' && payload !== null && 'intent_id' in payload && typeof payload.intent_id === 'string'
        ? payload.intent_id
        : null;
    return {
      ok: false,
      errors: result.error.issues.map((issue) => {
        const error: ValidationIssue = {
          intentId,
          field: issue.path.length > 0 ? String(issue.path[0]) : null,
          message: issue.message,
        };
        if (row !== undefined) error.row = row;
        return error;
      }),
    };
  }

  const data = result.data;
  const record: IntentRecord = {
    intentId: data.intent_id.trim(),
    intentName: data.intent_name.trim(),
    category: data.category.trim(),
    agentRouting: data.agent_routing.trim(),
    priority: data.priority ?? DEFAULT_PRIORITY,
    descriptionShort: data.description_short.trim(),
    trainingUtterances: data.training_utterances.map((utterance) => utterance.trim()),
    keywords: normalizeKeywords(data.keywords ?? []),
  };
  const disambiguationPrompt = blankToUndefined(data.disambiguation_prompt);
  if (disambiguationPrompt !== undefined) record.disambiguationPrompt = disambiguationPrompt;
  if (data.confidence_threshold !== null && data.confidence_threshold !== undefined) {
    record.confidenceThreshold = data.confidence_threshold;
  }
  return { ok: true, record };
}
