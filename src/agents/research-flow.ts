/**
 * Biography Research Flow
 *
 * Public entry point. Composes the workflow at construction (tool setup
 * errors surface here), opens the session in initialize(), and runs one
 * research pass per researchPerson() call. Errors during a run are logged
 * and reported as a null result; only setup is allowed to throw.
 */
import type { ResearchConfig } from '../config/index.js';
import type { SearchFunction } from '../tools/tavily-search.js';
import type { LoopStopReason } from '../workflow/state-machine.js';
import {
  parseReviewVerdict,
  reviewStatusOf,
  type ReviewStatus,
  type ReviewVerdict,
} from '../workflow/verdict.js';
import { SessionNotInitializedError, SessionSetupError } from '../utils/errors.js';
import { agentLogger, errorMessage } from '../utils/logger.js';
import { openAdkWorkflowSession } from './runner.js';
import type {
  ComposedWorkflow,
  SessionState,
  WorkflowSession,
  WorkflowSessionFactory,
} from './types.js';
import { composeWorkflow } from './workflow.js';

const STOP_REASONS: readonly LoopStopReason[] = [
  'approved',
  'budget_exhausted',
  'no_verdict',
  'refiner_complete',
];

export interface BiographyResearchFlowOptions {
  config: ResearchConfig;
  /** Replaces the Tavily search built from config.search */
  search?: SearchFunction;
  openSession?: WorkflowSessionFactory;
  sessionId?: string;
}

export function researchRequest(personName: string): string {
  return `Research and create an early life biography section summary for ${personName}`;
}

export class BiographyResearchFlow {
  readonly workflow: ComposedWorkflow;
  readonly sessionId: string;
  private readonly config: ResearchConfig;
  private readonly openSession: WorkflowSessionFactory;
  private session: WorkflowSession | null = null;
  private lastState: SessionState | null = null;

  constructor({
    config,
    search,
    openSession = openAdkWorkflowSession,
    sessionId = crypto.randomUUID(),
  }: BiographyResearchFlowOptions) {
    this.config = config;
    this.openSession = openSession;
    this.sessionId = sessionId;
    this.workflow = composeWorkflow({ config, search });
  }

  /**
   * Creates the session and runner. Must complete before researchPerson().
   */
  async initialize(): Promise<void> {
    try {
      this.session = await this.openSession(this.workflow, {
        appName: this.config.appName,
        userId: this.config.userId,
        sessionId: this.sessionId,
      });
      agentLogger.info(
        { sessionId: this.sessionId, mode: this.workflow.mode },
        'Session and runner initialized successfully'
      );
    } catch (error) {
      agentLogger.error({ error: errorMessage(error) }, 'Failed to initialize session and runner');
      throw error instanceof SessionSetupError
        ? error
        : new SessionSetupError(`Failed to initialize session and runner: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Runs the workflow once for `personName`. Resolves to the session's
   * answer_summary, else the final response text, else null.
   */
  async researchPerson(personName: string): Promise<string | null> {
    const name = personName.trim();
    if (!name) {
      agentLogger.error('Person name cannot be empty');
      return null;
    }

    const session = this.session;
    if (!session) {
      throw new SessionNotInitializedError();
    }

    this.lastState = null;

    try {
      await session.updateState({ person_name: name });
      agentLogger.info(`Starting research workflow for: ${name}`);

      let finalResponse: string | undefined;
      for await (const event of session.run(researchRequest(name))) {
        if (event.isFinal) {
          finalResponse = event.text;
          agentLogger.info({ author: event.author }, 'Research workflow completed');
          break;
        }
      }

      const state = await session.getState();
      this.lastState = state;

      if (state.answer_summary) {
        return state.answer_summary;
      }
      if (finalResponse) {
        return finalResponse;
      }
      agentLogger.warn('No final summary available after workflow completion');
      return null;
    } catch (error) {
      agentLogger.error({ error: errorMessage(error) }, 'Error during research workflow');
      await this.captureState(session);
      return null;
    }
  }

  /**
   * Keeps whatever the stages committed before a failed run
   */
  private async captureState(session: WorkflowSession): Promise<void> {
    try {
      this.lastState = await session.getState();
    } catch (error) {
      agentLogger.error({ error: errorMessage(error) }, 'Failed to read session state');
    }
  }

  getResearchData(): string | null {
    return this.lastState?.research_data ?? null;
  }

  getReviewVerdict(): ReviewVerdict | null {
    return parseReviewVerdict(this.lastState?.review_result);
  }

  getReviewStatus(): ReviewStatus | null {
    return reviewStatusOf(this.getReviewVerdict());
  }

  /**
   * Review text without its verdict prefix; for NEEDS_IMPROVEMENT only the
   * part before the first "|"
   */
  getReviewFeedback(): string | null {
    return this.getReviewVerdict()?.feedback ?? null;
  }

  getRefinementOutcome(): LoopStopReason | null {
    const outcome = this.lastState?.refinement_outcome;
    return STOP_REASONS.find((reason) => reason === outcome) ?? null;
  }
}
