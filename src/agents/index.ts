/**
 * Agents Module (ADK)
 *
 * Stage agents, workflow composition, the session adapter and the research
 * driver.
 *
 * Workflow shapes:
 * - iterative (default): IterativeResearchWorkflow loops research, answer,
 *   review and refine until the reviewer approves or the budget runs out
 * - single_pass: research, answer, then one review
 */

// Types
export * from './types.js';

// Stages
export { createStageAgent, type StageAgentOptions } from './stage.js';
export { RESEARCHER_STAGE, createResearchAgent } from './researcher.js';
export { ANSWERER_STAGE, createAnswerAgent } from './answerer.js';
export { REVIEWER_STAGE, createReviewerAgent } from './reviewer.js';
export { REFINER_STAGE, createRefinerAgent } from './refiner.js';
export { STAGE_DEFINITIONS, missingInputs } from './definitions.js';

// Composition
export { RefinementLoopAgent, type RefinementLoopAgentOptions } from './refinement-loop.js';
export {
  WORKFLOW_NAME,
  BASE_WORKFLOW_NAME,
  composeWorkflow,
  composeSinglePass,
  composeIterative,
  createStageAgents,
  type ComposerConfig,
  type ComposeWorkflowOptions,
} from './workflow.js';

// Runner
export {
  AdkWorkflowSession,
  openAdkWorkflowSession,
  createUserContent,
  eventText,
  toWorkflowEvent,
} from './runner.js';

// Driver
export {
  BiographyResearchFlow,
  researchRequest,
  type BiographyResearchFlowOptions,
} from './research-flow.js';
