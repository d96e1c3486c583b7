import { describe, it, expect } from 'vitest';
import { buildClarificationPrompt } from '../../core/classification/clarification.js';

describe('buildClarificationPrompt', () => {
  it('asks for confirmation of a single contender', () => {
    expect(buildClarificationPrompt(['Checking the status of a claim.'])).toBe(
      'Just to confirm, are you asking about checking the status of a claim?'
    );
  });

  it('offers two contenders as a choice', () => {
    expect(buildClarificationPrompt(['Refilling a prescription', 'Explaining plan benefits'])).toBe(
      'I want to make sure I help you correctly. Are you asking about refilling a prescription or explaining plan benefits?'
    );
  });

  it('lists three or more contenders and keeps acronyms', () => {
    expect(buildClarificationPrompt(['HSA balance', 'Claims', 'Benefits'])).toBe(
      'I want to make sure I help you correctly. Are you asking about HSA balance, claims, or benefits?'
    );
  });

  it('lowercases a leading article followed by a space', () => {
    expect(buildClarificationPrompt(['A claim question'])).toBe('Just to confirm, are you asking about a claim question?');
  });

  it('lowercases descriptions whose second character is not a letter', () => {
    expect(buildClarificationPrompt(['I-9 paperwork', 'X1 plan upgrade'])).toBe(
      'I want to make sure I help you correctly. Are you asking about i-9 paperwork or x1 plan upgrade?'
    );
  });
});
