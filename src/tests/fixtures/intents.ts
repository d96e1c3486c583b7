import type { IntentRecord, RegistrySettings } from '../../core/intents/types.js';

export const TEST_SETTINGS: RegistrySettings = {
  defaultConfidenceThreshold: 0.7,
  fallback: { noMatchMessage: 'Could you tell me a bit more about what you need?' },
};

export const PHARMACY: IntentRecord = {
  intentId: 'INT-PHR-0001',
  intentName: 'refill_prescription',
  category: 'pharmacy',
  agentRouting: 'PharmacyAgent',
  priority: 4,
  descriptionShort: 'Refilling a prescription',
  disambiguationPrompt: 'Are you asking about a prescription refill or about what your plan covers?',
  trainingUtterances: [
    'I need to refill my prescription',
    'Where is the nearest pharmacy?',
    'I need help with my medication',
  ],
  keywords: ['pharmacy', 'prescription', 'medication', 'refill'],
};

export const BENEFITS: IntentRecord = {
  intentId: 'INT-BEN-0001',
  intentName: 'explain_benefits',
  category: 'benefits',
  agentRouting: 'BenefitsAgent',
  priority: 3,
  descriptionShort: 'Explaining plan benefits',
  trainingUtterances: ['What does my plan cover', 'Explain my benefits', 'I need help with my coverage'],
  keywords: ['benefits', 'coverage', 'plan', 'covered'],
};

export const CLAIMS: IntentRecord = {
  intentId: 'INT-CLM-0001',
  intentName: 'claim_status',
  category: 'claims',
  agentRouting: 'ClaimsAgent',
  priority: 3,
  descriptionShort: 'Checking the status of a claim',
  trainingUtterances: [
    'What is the status of my claim',
    'Has my claim been processed',
    'Why was my claim denied',
    'When will my claim be paid',
    'Track my recent claim',
  ],
  keywords: ['claim', 'denied'],
};

export function makeIntent(overrides: Partial<IntentRecord> = {}): IntentRecord {
  return { ...CLAIMS, ...overrides };
}
