/**
 * Refinement State Machine
 *
 * Drives the research → answer → review cycle with an explicit transition
 * table and an iteration budget. The loop is generic over the event type so
 * the ADK agent that hosts it and the tests can supply their own stage
 * runners. Stages run strictly one after another: the next stage starts only
 * after the previous stage's events have all been consumed, which is when
 * the runner has committed its output to session state.
 */
import type { SessionState, StageRole } from '../agents/types.js';
import {
  parseRefinementAction,
  parseReviewVerdict,
  researchDirectiveOf,
} from './verdict.js';

export type Phase = 'researching' | 'answering' | 'reviewing' | 'refining' | 'done';

export type ActivePhase = Exclude<Phase, 'done'>;

export type LoopStopReason = 'approved' | 'budget_exhausted' | 'no_verdict' | 'refiner_complete';

export type Transition = { to: ActivePhase } | { to: 'done'; reason: LoopStopReason };

export interface TransitionContext {
  state: SessionState;
  iteration: number;
  maxIterations: number;
}

export interface LoopOutcome {
  iterations: number;
  reason: LoopStopReason;
}

export const PHASE_ROLES: Record<ActivePhase, StageRole> = {
  researching: 'researcher',
  answering: 'answerer',
  reviewing: 'reviewer',
  refining: 'refiner',
};

export const TRANSITIONS: Record<ActivePhase, (context: TransitionContext) => Transition> = {
  researching: () => ({ to: 'answering' }),
  answering: () => ({ to: 'reviewing' }),
  reviewing: ({ state, iteration, maxIterations }) => {
    const verdict = parseReviewVerdict(state.review_result);
    if (!verdict) {
      return { to: 'done', reason: 'no_verdict' };
    }
    if (verdict.kind === 'approved') {
      return { to: 'done', reason: 'approved' };
    }
    return iteration < maxIterations
      ? { to: 'refining' }
      : { to: 'done', reason: 'budget_exhausted' };
  },
  refining: ({ state }) =>
    parseRefinementAction(state.refinement_action)?.kind === 'complete'
      ? { to: 'done', reason: 'refiner_complete' }
      : { to: 'researching' },
};

/**
 * What the researcher should look for next: the reviewer's follow-up, else
 * the refiner's explanation, else the reviewer's feedback.
 */
export function additionalResearchFor(state: SessionState): string | undefined {
  const verdict = parseReviewVerdict(state.review_result);
  const action = parseRefinementAction(state.refinement_action);

  return (
    researchDirectiveOf(verdict) ??
    (action?.kind === 'continue' && action.detail ? action.detail : undefined) ??
    (verdict?.kind === 'needs_improvement' && verdict.feedback ? verdict.feedback : undefined)
  );
}

export interface PhaseHost<E> {
  runStage(role: StageRole): AsyncIterable<E>;
  readState(): SessionState;
  /** Builds an event that writes `delta` to session state once it is consumed */
  commit(delta: SessionState, message?: string): E;
}

export interface RefinementLoopOptions {
  maxIterations: number;
  onTransition?: (from: ActivePhase, transition: Transition, iteration: number) => void;
}

export async function* runRefinementLoop<E>(
  host: PhaseHost<E>,
  { maxIterations, onTransition }: RefinementLoopOptions
): AsyncGenerator<E, LoopOutcome, undefined> {
  const budget = Math.max(1, Math.floor(maxIterations));
  let phase: ActivePhase = 'researching';
  let iteration = 1;

  while (true) {
    yield* host.runStage(PHASE_ROLES[phase]);

    const state = host.readState();
    const transition = TRANSITIONS[phase]({ state, iteration, maxIterations: budget });
    onTransition?.(phase, transition, iteration);

    if (transition.to === 'done') {
      return { iterations: iteration, reason: transition.reason };
    }

    if (phase === 'refining') {
      iteration += 1;
      const directive = additionalResearchFor(state);
      if (directive) {
        yield host.commit(
          { additional_research_needed: directive },
          `Additional research needed (iteration ${iteration} of ${budget}): ${directive}`
        );
      }
    }

    phase = transition.to;
  }
}
