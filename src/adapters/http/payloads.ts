import type {
  ClassificationDecision,
  IntentCandidate,
  ValidationIssue,
  ValidationReport,
} from '../../core/intents/types.js';

export interface ValidationIssuePayload {
  intent_id: string | null;
  field: string | null;
  message: string;
  row?: number;
}

export interface ValidationReportPayload {
  valid: boolean;
  errors: ValidationIssuePayload[];
  warnings: ValidationIssuePayload[];
}

export interface CandidatePayload {
  intent_id: string;
  intent_name: string;
  agent: string;
  priority: number;
  confidence: number;
  scores: { exact: number; keyword: number; fuzzy: number };
}

export interface ClassificationDecisionPayload {
  intent_name: string | null;
  agent: string | null;
  confidence: number;
  needs_clarification: boolean;
  disambiguation_prompt: string | null;
  candidates: CandidatePayload[];
}

function toIssuePayload(issue: ValidationIssue): ValidationIssuePayload {
  const payload: ValidationIssuePayload = { intent_id: issue.intentId, field: issue.field, message: issue.message };
  if (issue.row !== undefined) payload.row = issue.row;
  return payload;
}

export function toReportPayload(report: ValidationReport): ValidationReportPayload {
  return {
    valid: report.valid,
    errors: report.errors.map(toIssuePayload),
    warnings: report.warnings.map(toIssuePayload),
  };
}

function toCandidatePayload(candidate: IntentCandidate): CandidatePayload {
  return {
    intent_id: candidate.intentId,
    intent_name: candidate.intentName,
    agent: candidate.agent,
    priority: candidate.priority,
    confidence: candidate.confidence,
    scores: { ...candidate.scores },
  };
}

export function toDecisionPayload(decision: ClassificationDecision): ClassificationDecisionPayload {
  return {
    intent_name: decision.intentName,
    agent: decision.agent,
    confidence: decision.confidence,
    needs_clarification: decision.needsClarification,
    disambiguation_prompt: decision.disambiguationPrompt,
    candidates: decision.candidates.map(toCandidatePayload),
  };
}
