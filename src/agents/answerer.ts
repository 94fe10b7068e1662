/**
 * Answer Agent (ADK)
 *
 * Turns `research_data` into a 50-100 word "Early Life" summary stored in
 * `answer_summary`. Later iterations overwrite the previous draft.
 */
import type { LlmAgent } from '@google/adk';
import { createStageAgent } from './stage.js';
import type { StageDefinition } from './types.js';

export const ANSWERER_STAGE: StageDefinition = {
  role: 'answerer',
  name: 'AnswerAgent',
  description: 'Writes the early-life summary from the research data.',
  reads: ['person_name', 'research_data'],
  outputKey: 'answer_summary',
};

export function createAnswerAgent({ model, instruction }: { model: string; instruction: string }): LlmAgent {
  return createStageAgent(ANSWERER_STAGE, { model, instruction });
}
