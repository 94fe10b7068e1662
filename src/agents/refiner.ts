/**
 * Refiner Agent (ADK)
 *
 * Reads `review_result` and decides whether another research pass is
 * needed, answering REFINEMENT_COMPLETE or CONTINUE_REFINEMENT in
 * `refinement_action`.
 */
import type { LlmAgent } from '@google/adk';
import { createStageAgent } from './stage.js';
import type { StageDefinition } from './types.js';

export const REFINER_STAGE: StageDefinition = {
  role: 'refiner',
  name: 'RefinerAgent',
  description: 'Decides whether the review calls for another research pass.',
  reads: ['review_result'],
  outputKey: 'refinement_action',
};

export function createRefinerAgent({ model, instruction }: { model: string; instruction: string }): LlmAgent {
  return createStageAgent(REFINER_STAGE, { model, instruction });
}
