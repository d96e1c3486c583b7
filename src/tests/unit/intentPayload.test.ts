import { describe, it, expect } from 'vitest';
import { parseIntentPayload } from '../../core/ingestion/intentPayload.js';

const payload = {
  intent_id: ' INT-BEN-0002 ',
  intent_name: 'deductible_balance',
  category: 'benefits',
  agent_routing: 'BenefitsAgent',
  description_short: 'Remaining deductible',
  training_utterances: ['How much of my deductible is left ', 'Have I met my deductible'],
  keywords: ['Deductible', 'deductible ', 'Out of Pocket'],
};

describe('parseIntentPayload', () => {
  it('builds a trimmed record with defaults', () => {
    const result = parseIntentPayload({ ...payload, disambiguation_prompt: '   ', confidence_threshold: null });

    expect(result).toEqual({
      ok: true,
      record: {
        intentId: 'INT-BEN-0002',
        intentName: 'deductible_balance',
        category: 'benefits',
        agentRouting: 'BenefitsAgent',
        priority: 3,
        descriptionShort: 'Remaining deductible',
        trainingUtterances: ['How much of my deductible is left', 'Have I met my deductible'],
        keywords: ['deductible', 'out of pocket'],
      },
    });
    if (result.ok) {
      expect('disambiguationPrompt' in result.record).toBe(false);
      expect('confidenceThreshold' in result.record).toBe(false);
    }
  });

  it('keeps explicit priority, prompt and threshold', () => {
    const result = parseIntentPayload({
      ...payload,
      priority: 5,
      disambiguation_prompt: 'Do you mean your deductible or your copay?',
      confidence_threshold: 0.8,
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.record.priority).toBe(5);
      expect(result.record.disambiguationPrompt).toBe('Do you mean your deductible or your copay?');
      expect(result.record.confidenceThreshold).toBe(0.8);
    }
  });

  it('leaves range checks to validation', () => {
    const result = parseIntentPayload({ ...payload, priority: 9 });
    expect(result.ok).toBe(true);
  });

  it('reports missing fields with the submitted id and row', () => {
    const result = parseIntentPayload({ intent_id: 'INT-BEN-0002', category: 'benefits' }, 4);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors[0]).toEqual({
        intentId: 'INT-BEN-0002',
        field: 'intent_name',
        message: 'intent_name is required',
        row: 4,
      });
      expect(result.errors.map((error) => error.field)).toEqual([
        'intent_name',
        'agent_routing',
        'description_short',
        'training_utterances',
      ]);
    }
  });

  it('rejects a payload that is not an object', () => {
    const result = parseIntentPayload(['INT-BEN-0002']);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.intentId).toBeNull();
      expect(result.errors[0]?.field).toBeNull();
    }
  });
});
