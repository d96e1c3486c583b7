export type { IntentRecord } from './IntentRecord.js';

/** One finding of ingestion or validation. `field` uses payload/column names (snake_case). */
export interface ValidationIssue {
  intentId: string | null;
  field: string | null;
  message: string;
  /** Index into the submitted rows; only set for bulk ingestion findings. */
  row?: number;
}

export interface ValidationReport {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/** External (persisted/API) shape of one intent. */
export interface IntentPayload {
  intent_id: string;
  intent_name: string;
  category: string;
  agent_routing: string;
  priority: number;
  description_short: string;
  disambiguation_prompt?: string;
  training_utterances: string[];
  keywords: string[];
  confidence_threshold?: number;
}

export interface FallbackPolicy {
  /** Guidance returned with a no-match decision. */
  noMatchMessage: string;
}

export interface RegistrySettings {
  defaultConfidenceThreshold: number;
  fallback: FallbackPolicy;
}

export interface ScoreBreakdown {
  exact: number;
  keyword: number;
  fuzzy: number;
}

export interface IntentCandidate {
  intentId: string;
  intentName: string;
  agent: string;
  priority: number;
  confidence: number;
  scores: ScoreBreakdown;
}

export interface ClassificationDecision {
  intentName: string | null;
  agent: string | null;
  confidence: number;
  needsClarification: boolean;
  disambiguationPrompt: string | null;
  candidates: IntentCandidate[];
}
