/**
 * Refinement Loop Agent (ADK)
 *
 * Custom ADK agent hosting the refinement state machine. Each phase runs
 * one stage sub-agent on the shared invocation context; session state is
 * read back between phases to pick the next transition. When the loop stops
 * it emits a closing event carrying the current summary and the stop reason,
 * flagged with escalate so the session adapter can recognize the end of the
 * run.
 *
 * Dependencies:
 * - @google/adk: BaseAgent, InvocationContext, createEvent, createEventActions
 */
import {
  BaseAgent,
  createEvent,
  createEventActions,
  type Event,
  type InvocationContext,
} from '@google/adk';
import { runRefinementLoop, type PhaseHost } from '../workflow/state-machine.js';
import { agentLogger } from '../utils/logger.js';
import { missingInputs } from './definitions.js';
import { readSessionState, type StageAgents, type StageRole } from './types.js';

export interface RefinementLoopAgentOptions {
  name: string;
  description?: string;
  stages: StageAgents;
  maxIterations: number;
}

export class RefinementLoopAgent extends BaseAgent {
  readonly maxIterations: number;
  private readonly stages: StageAgents;

  constructor({ name, description, stages, maxIterations }: RefinementLoopAgentOptions) {
    super({
      name,
      description,
      subAgents: [stages.researcher, stages.answerer, stages.reviewer, stages.refiner],
    });
    this.stages = stages;
    this.maxIterations = maxIterations;
  }

  protected async *runAsyncImpl(ctx: InvocationContext) {
    const host: PhaseHost<Event> = {
      runStage: (role: StageRole) => {
        const missing = missingInputs(role, readSessionState(ctx.session.state));
        agentLogger.debug({ missing }, `[Loop] Running ${this.stages[role].name}`);
        return this.stages[role].runAsync(ctx);
      },
      readState: () => readSessionState(ctx.session.state),
      commit: (stateDelta, message) =>
        createEvent({
          invocationId: ctx.invocationId,
          author: this.name,
          content: message ? { role: 'model', parts: [{ text: message }] } : undefined,
          actions: createEventActions({ stateDelta }),
        }),
    };

    const outcome = yield* runRefinementLoop(host, {
      maxIterations: this.maxIterations,
      onTransition: (from, transition, iteration) => {
        agentLogger.info(
          { from, to: transition.to, iteration, maxIterations: this.maxIterations },
          '[Loop] Transition'
        );
      },
    });

    agentLogger.info(outcome, '[Loop] Refinement finished');

    const summary = readSessionState(ctx.session.state).answer_summary ?? '';
    yield createEvent({
      invocationId: ctx.invocationId,
      author: this.name,
      content: { role: 'model', parts: [{ text: summary }] },
      actions: createEventActions({
        escalate: true,
        stateDelta: { refinement_outcome: outcome.reason },
      }),
    });
  }

  protected async *runLiveImpl(ctx: InvocationContext) {
    yield* this.runAsyncImpl(ctx);
  }
}
