/**
 * Reviewer Agent (ADK)
 *
 * Critic half of the generator-critic pair: grades `answer_summary` against
 * `research_data` and answers with an APPROVED or NEEDS_IMPROVEMENT line in
 * `review_result`.
 */
import type { LlmAgent } from '@google/adk';
import { createStageAgent } from './stage.js';
import type { StageDefinition } from './types.js';

export const REVIEWER_STAGE: StageDefinition = {
  role: 'reviewer',
  name: 'ReviewerAgent',
  description: 'Evaluates the summary for completeness, depth and quality.',
  reads: ['research_data', 'answer_summary'],
  outputKey: 'review_result',
};

export function createReviewerAgent({ model, instruction }: { model: string; instruction: string }): LlmAgent {
  return createStageAgent(REVIEWER_STAGE, { model, instruction });
}
