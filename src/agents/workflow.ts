/**
 * Workflow Composer (ADK)
 *
 * Arranges the four stage agents into the invocable workflow the runner
 * drives. Two shapes:
 *
 * - single_pass: SequentialAgent(IterativeResearchWorkflow)[
 *     SequentialAgent(BaseResearchWorkflow)[research, answer], review ]
 *   The refiner is built but not wired in.
 * - iterative: RefinementLoopAgent(IterativeResearchWorkflow) running the
 *   refinement state machine over all four stages, bounded by maxIterations.
 *
 * Agents are created fresh on every call: an ADK agent can belong to only
 * one parent.
 *
 * Dependencies:
 * - @google/adk: SequentialAgent, isFinalResponse
 */
import { SequentialAgent, isFinalResponse } from '@google/adk';
import type { ResearchConfig } from '../config/index.js';
import { getInstruction } from '../prompts/early-life.js';
import { createTavilySearch, type SearchFunction } from '../tools/tavily-search.js';
import { createAnswerAgent } from './answerer.js';
import { RefinementLoopAgent } from './refinement-loop.js';
import { createRefinerAgent } from './refiner.js';
import { createResearchAgent } from './researcher.js';
import { createReviewerAgent } from './reviewer.js';
import type { ComposedWorkflow, StageAgents } from './types.js';

export const WORKFLOW_NAME = 'IterativeResearchWorkflow';
export const BASE_WORKFLOW_NAME = 'BaseResearchWorkflow';

export type ComposerConfig = Pick<
  ResearchConfig,
  'mode' | 'maxIterations' | 'models' | 'prompts' | 'search'
>;

export interface ComposeWorkflowOptions {
  config: ComposerConfig;
  /** Replaces the Tavily search built from config.search */
  search?: SearchFunction;
}

export function createStageAgents(
  config: Pick<ResearchConfig, 'models' | 'prompts'>,
  search: SearchFunction
): StageAgents {
  return {
    researcher: createResearchAgent({
      model: config.models.researcher,
      instruction: getInstruction('researcher', config.prompts),
      search,
    }),
    answerer: createAnswerAgent({
      model: config.models.answerer,
      instruction: getInstruction('answerer', config.prompts),
    }),
    reviewer: createReviewerAgent({
      model: config.models.reviewer,
      instruction: getInstruction('reviewer', config.prompts),
    }),
    refiner: createRefinerAgent({
      model: config.models.refiner,
      instruction: getInstruction('refiner', config.prompts),
    }),
  };
}

/**
 * Builds the workflow. Throws ConfigurationError when no search function is
 * given and config.search has no API key.
 */
export function composeWorkflow({ config, search }: ComposeWorkflowOptions): ComposedWorkflow {
  const stages = createStageAgents(config, search ?? createTavilySearch(config.search));

  return config.mode === 'single_pass'
    ? composeSinglePass(stages)
    : composeIterative(stages, config.maxIterations);
}

export function composeSinglePass(stages: StageAgents): ComposedWorkflow {
  const base = new SequentialAgent({
    name: BASE_WORKFLOW_NAME,
    description: 'Researches the person, then writes the summary.',
    subAgents: [stages.researcher, stages.answerer],
  });

  const root = new SequentialAgent({
    name: WORKFLOW_NAME,
    description: 'Research and summary followed by one quality review.',
    subAgents: [base, stages.reviewer],
  });

  return {
    mode: 'single_pass',
    root,
    stages,
    isRunComplete: (event) => isFinalResponse(event) && event.author === stages.reviewer.name,
  };
}

export function composeIterative(stages: StageAgents, maxIterations: number): ComposedWorkflow {
  const root = new RefinementLoopAgent({
    name: WORKFLOW_NAME,
    description: 'Research, summary and review, refined until approved or out of iterations.',
    stages,
    maxIterations,
  });

  return {
    mode: 'iterative',
    root,
    stages,
    isRunComplete: (event) => event.author === root.name && event.actions?.escalate === true,
  };
}
