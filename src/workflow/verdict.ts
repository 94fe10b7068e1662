/**
 * Verdict Parsing
 *
 * The reviewer and refiner answer in free text with sentinel prefixes.
 * These parsers are the only place that text is interpreted; everything
 * downstream works with the tagged results. Unrecognized text parses to
 * null ("no verdict").
 */

const APPROVED_PREFIX = 'APPROVED:';
const NEEDS_IMPROVEMENT_PREFIX = 'NEEDS_IMPROVEMENT:';
const FOLLOW_UP_DELIMITER = '|';
const RESEARCH_NEEDED_LABEL = 'RESEARCH_NEEDED:';

const REFINEMENT_COMPLETE_PREFIX = 'REFINEMENT_COMPLETE:';
const CONTINUE_REFINEMENT_PREFIX = 'CONTINUE_REFINEMENT:';

export type ReviewVerdict =
  | { kind: 'approved'; feedback: string }
  | { kind: 'needs_improvement'; feedback: string; followUp?: string };

export type ReviewStatus = 'APPROVED' | 'NEEDS_IMPROVEMENT';

export type RefinementAction =
  | { kind: 'complete'; detail: string }
  | { kind: 'continue'; detail: string };

export function parseReviewVerdict(text: string | null | undefined): ReviewVerdict | null {
  const trimmed = text?.trim();
  if (!trimmed) {
    return null;
  }

  if (trimmed.startsWith(APPROVED_PREFIX)) {
    return { kind: 'approved', feedback: trimmed.slice(APPROVED_PREFIX.length).trim() };
  }

  if (trimmed.startsWith(NEEDS_IMPROVEMENT_PREFIX)) {
    const body = trimmed.slice(NEEDS_IMPROVEMENT_PREFIX.length);
    const split = body.indexOf(FOLLOW_UP_DELIMITER);
    if (split < 0) {
      return { kind: 'needs_improvement', feedback: body.trim() };
    }
    const followUp = body.slice(split + 1).trim();
    return {
      kind: 'needs_improvement',
      feedback: body.slice(0, split).trim(),
      ...(followUp ? { followUp } : {}),
    };
  }

  return null;
}

export function reviewStatusOf(verdict: ReviewVerdict | null): ReviewStatus | null {
  switch (verdict?.kind) {
    case 'approved':
      return 'APPROVED';
    case 'needs_improvement':
      return 'NEEDS_IMPROVEMENT';
    default:
      return null;
  }
}

/**
 * The follow-up payload as a research brief, without its RESEARCH_NEEDED label
 */
export function researchDirectiveOf(verdict: ReviewVerdict | null): string | undefined {
  if (verdict?.kind !== 'needs_improvement' || !verdict.followUp) {
    return undefined;
  }
  const { followUp } = verdict;
  const directive = followUp.startsWith(RESEARCH_NEEDED_LABEL)
    ? followUp.slice(RESEARCH_NEEDED_LABEL.length).trim()
    : followUp;
  return directive || undefined;
}

export function parseRefinementAction(text: string | null | undefined): RefinementAction | null {
  const trimmed = text?.trim();
  if (!trimmed) {
    return null;
  }
  if (trimmed.startsWith(REFINEMENT_COMPLETE_PREFIX)) {
    return { kind: 'complete', detail: trimmed.slice(REFINEMENT_COMPLETE_PREFIX.length).trim() };
  }
  if (trimmed.startsWith(CONTINUE_REFINEMENT_PREFIX)) {
    return { kind: 'continue', detail: trimmed.slice(CONTINUE_REFINEMENT_PREFIX.length).trim() };
  }
  return null;
}
