import { describe, it, expect } from 'vitest';
import {
  parseRefinementAction,
  parseReviewVerdict,
  researchDirectiveOf,
  reviewStatusOf,
} from '../../src/workflow/verdict.js';

describe('parseReviewVerdict', () => {
  it('parses an approval and strips the prefix', () => {
    expect(parseReviewVerdict('APPROVED: solid summary')).toEqual({
      kind: 'approved',
      feedback: 'solid summary',
    });
  });

  it('splits NEEDS_IMPROVEMENT feedback at the first "|"', () => {
    expect(parseReviewVerdict('NEEDS_IMPROVEMENT: missing dates|RESEARCH_NEEDED: dates')).toEqual({
      kind: 'needs_improvement',
      feedback: 'missing dates',
      followUp: 'RESEARCH_NEEDED: dates',
    });
  });

  it('keeps later "|" characters in the follow-up', () => {
    const verdict = parseReviewVerdict('NEEDS_IMPROVEMENT: thin|RESEARCH_NEEDED: school | parents');
    expect(verdict).toEqual({
      kind: 'needs_improvement',
      feedback: 'thin',
      followUp: 'RESEARCH_NEEDED: school | parents',
    });
  });

  it('omits an empty follow-up', () => {
    expect(parseReviewVerdict('NEEDS_IMPROVEMENT: too short|  ')).toEqual({
      kind: 'needs_improvement',
      feedback: 'too short',
    });
  });

  it('accepts NEEDS_IMPROVEMENT without a delimiter', () => {
    expect(parseReviewVerdict('NEEDS_IMPROVEMENT: no sources cited')).toEqual({
      kind: 'needs_improvement',
      feedback: 'no sources cited',
    });
  });

  it('ignores surrounding whitespace', () => {
    expect(parseReviewVerdict('\n  APPROVED: fine\n')).toEqual({ kind: 'approved', feedback: 'fine' });
  });

  it('returns null for empty, missing or unrecognized text', () => {
    expect(parseReviewVerdict('')).toBeNull();
    expect(parseReviewVerdict(undefined)).toBeNull();
    expect(parseReviewVerdict(null)).toBeNull();
    expect(parseReviewVerdict('Looks good to me')).toBeNull();
    expect(parseReviewVerdict('approved: lowercase')).toBeNull();
  });
});

describe('reviewStatusOf', () => {
  it('maps verdicts to their status', () => {
    expect(reviewStatusOf(parseReviewVerdict('APPROVED: ok'))).toBe('APPROVED');
    expect(reviewStatusOf(parseReviewVerdict('NEEDS_IMPROVEMENT: more'))).toBe('NEEDS_IMPROVEMENT');
    expect(reviewStatusOf(null)).toBeNull();
  });
});

describe('researchDirectiveOf', () => {
  it('strips the RESEARCH_NEEDED label', () => {
    const verdict = parseReviewVerdict('NEEDS_IMPROVEMENT: missing dates|RESEARCH_NEEDED: dates');
    expect(researchDirectiveOf(verdict)).toBe('dates');
  });

  it('returns an unlabeled follow-up as is', () => {
    const verdict = parseReviewVerdict('NEEDS_IMPROVEMENT: vague|find birthplace');
    expect(researchDirectiveOf(verdict)).toBe('find birthplace');
  });

  it('returns undefined without a follow-up or for approvals', () => {
    expect(researchDirectiveOf(parseReviewVerdict('NEEDS_IMPROVEMENT: vague'))).toBeUndefined();
    expect(researchDirectiveOf(parseReviewVerdict('APPROVED: ok'))).toBeUndefined();
    expect(researchDirectiveOf(parseReviewVerdict('NEEDS_IMPROVEMENT: x|RESEARCH_NEEDED:'))).toBeUndefined();
  });
});

describe('parseRefinementAction', () => {
  it('parses both actions', () => {
    expect(parseRefinementAction('REFINEMENT_COMPLETE: approved')).toEqual({
      kind: 'complete',
      detail: 'approved',
    });
    expect(parseRefinementAction('CONTINUE_REFINEMENT: need school years')).toEqual({
      kind: 'continue',
      detail: 'need school years',
    });
  });

  it('returns null for anything else', () => {
    expect(parseRefinementAction('keep going')).toBeNull();
    expect(parseRefinementAction('')).toBeNull();
  });
});
