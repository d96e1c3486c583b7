import type {
  ClassificationDecision,
  IntentCandidate,
  IntentRecord,
  ScoreBreakdown,
} from '../intents/types.js';
import type { RegistrySnapshot } from '../registry/RegistrySnapshot.js';
import { buildClarificationPrompt } from './clarification.js';
import {
  containsPhrase,
  contentTokens,
  diceCoefficient,
  editDistance,
  normalizeUtterance,
  roundScore,
  toWords,
} from './textSimilarity.js';

export type ScoringWeights = ScoreBreakdown;

export interface ClassifierSettings {
  /** Weights of the exact/keyword/fuzzy sub-scores; the sum is clipped to [0, 1]. */
  weights: ScoringWeights;
  /** Minimum lead of the top intent over the runner-up for a firm match. */
  ambiguityMargin: number;
  /** Below this the top intent is not considered at all (no match). */
  considerationFloor: number;
  /** How many ranked intents a decision reports. */
  candidateCount: number;
  /** Edit distance still counted as an exact match... */
  nearExactMaxDistance: number;
  /** ...for texts at least this long. */
  nearExactMinLength: number;
}

export const DEFAULT_CLASSIFIER_SETTINGS: ClassifierSettings = {
  weights: { exact: 1, keyword: 0.35, fuzzy: 0.65 },
  ambiguityMargin: 0.1,
  considerationFloor: 0.3,
  candidateCount: 3,
  nearExactMaxDistance: 2,
  nearExactMinLength: 12,
};

interface PreparedUtterance {
  words: string;
  tokens: Set<string>;
}

interface PreparedIntent {
  record: IntentRecord;
  utterances: PreparedUtterance[];
  keywordPhrases: string[][];
}

interface PreparedInput {
  words: string[];
  joined: string;
  tokens: Set<string>;
}

interface ScoredIntent {
  record: IntentRecord;
  candidate: IntentCandidate;
}

function compareScored(a: ScoredIntent, b: ScoredIntent): number {
  if (a.candidate.confidence !== b.candidate.confidence) return b.candidate.confidence - a.candidate.confidence;
  if (a.record.priority !== b.record.priority) return b.record.priority - a.record.priority;
  if (a.record.intentId === b.record.intentId) return 0;
  return a.record.intentId < b.record.intentId ? -1 : 1;
}

/**
 * Rule-based scorer. classify() is pure: the same utterance against the same snapshot
 * always yields the same decision.
 */
export class ClassificationEngine {
  private readonly settings: ClassifierSettings;
  private readonly prepared = new WeakMap<RegistrySnapshot, PreparedIntent[]>();

  constructor(settings: Partial<ClassifierSettings> = {}) {
    this.settings = {
      ...DEFAULT_CLASSIFIER_SETTINGS,
      ...settings,
      weights: { ...DEFAULT_CLASSIFIER_SETTINGS.weights, ...settings.weights },
    };
  }

  classify(utterance: string, snapshot: RegistrySnapshot): ClassificationDecision {
    const normalized = normalizeUtterance(utterance);
    const words = toWords(normalized);
    if (words.length === 0) {
      return this.noMatch(snapshot, []);
    }

    const input: PreparedInput = { words, joined: words.join(' '), tokens: contentTokens(normalized) };
    const ranked = this.prepare(snapshot)
      .map((intent) => this.score(intent, input))
      .sort(compareScored);

    const [top, runnerUp] = ranked;
    if (!top || top.candidate.confidence < this.settings.considerationFloor) {
      return this.noMatch(snapshot, ranked);
    }

    const { ambiguityMargin, considerationFloor } = this.settings;
    const lead = runnerUp ? roundScore(top.candidate.confidence - runnerUp.candidate.confidence) : Infinity;

    if (top.candidate.confidence >= snapshot.thresholdFor(top.record) && lead >= ambiguityMargin) {
      return {
        intentName: top.record.intentName,
        agent: top.record.agentRouting,
        confidence: top.candidate.confidence,
        needsClarification: false,
        disambiguationPrompt: null,
        candidates: this.topCandidates(ranked),
      };
    }

    const contenders = [
      top,
      ...ranked
        .slice(1)
        .filter(
          (scored) =>
            scored.candidate.confidence >= considerationFloor &&
            roundScore(top.candidate.confidence - scored.candidate.confidence) < ambiguityMargin
        ),
    ].slice(0, Math.max(2, this.settings.candidateCount));

    return {
      intentName: null,
      agent: null,
      confidence: top.candidate.confidence,
      needsClarification: true,
      disambiguationPrompt:
        top.record.disambiguationPrompt ??
        buildClarificationPrompt(contenders.map((scored) => scored.record.descriptionShort)),
      candidates: contenders.map((scored) => scored.candidate),
    };
  }

  private noMatch(snapshot: RegistrySnapshot, ranked: ScoredIntent[]): ClassificationDecision {
    return {
      intentName: null,
      agent: null,
      confidence: ranked[0]?.candidate.confidence ?? 0,
      needsClarification: false,
      disambiguationPrompt: snapshot.settings.fallback.noMatchMessage,
      candidates: this.topCandidates(ranked),
    };
  }

  private topCandidates(ranked: ScoredIntent[]): IntentCandidate[] {
    return ranked
      .filter((scored) => scored.candidate.confidence > 0)
      .slice(0, this.settings.candidateCount)
      .map((scored) => scored.candidate);
  }

  private score(intent: PreparedIntent, input: PreparedInput): ScoredIntent {
    const { weights } = this.settings;
    const scores: ScoreBreakdown = {
      exact: this.exactScore(intent, input),
      keyword: this.keywordScore(intent, input),
      fuzzy: roundScore(
        intent.utterances.reduce((best, utterance) => Math.max(best, diceCoefficient(input.tokens, utterance.tokens)), 0)
      ),
    };
    const combined = weights.exact * scores.exact + weights.keyword * scores.keyword + weights.fuzzy * scores.fuzzy;
    const { record } = intent;

    return {
      record,
      candidate: {
        intentId: record.intentId,
        intentName: record.intentName,
        agent: record.agentRouting,
        priority: record.priority,
        confidence: roundScore(Math.min(1, Math.max(0, combined))),
        scores,
      },
    };
  }

  private exactScore(intent: PreparedIntent, input: PreparedInput): number {
    const { nearExactMaxDistance, nearExactMinLength } = this.settings;
    const matched = intent.utterances.some((utterance) => {
      if (utterance.words === input.joined) return true;
      if (input.joined.length < nearExactMinLength || utterance.words.length < nearExactMinLength) return false;
      if (Math.abs(utterance.words.length - input.joined.length) > nearExactMaxDistance) return false;
      return editDistance(utterance.words, input.joined) <= nearExactMaxDistance;
    });
    return matched ? 1 : 0;
  }

  private keywordScore(intent: PreparedIntent, input: PreparedInput): number {
    if (intent.keywordPhrases.length === 0) return 0;
    const matched = intent.keywordPhrases.filter((phrase) => containsPhrase(input.words, phrase)).length;
    return roundScore(matched / intent.keywordPhrases.length);
  }

  private prepare(snapshot: RegistrySnapshot): PreparedIntent[] {
    const cached = this.prepared.get(snapshot);
    if (cached) return cached;

    const prepared = snapshot.records.map((record) => ({
      record,
      utterances: record.trainingUtterances.map((utterance) => ({
        words: toWords(normalizeUtterance(utterance)).join(' '),
        tokens: contentTokens(utterance),
      })),
      keywordPhrases: record.keywords.map((keyword) => toWords(keyword)).filter((phrase) => phrase.length > 0),
    }));
    this.prepared.set(snapshot, prepared);
    return prepared;
  }
}
