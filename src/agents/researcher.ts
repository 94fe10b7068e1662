/**
 * Research Agent (ADK)
 *
 * Searches the web for the early life of the person in `person_name` and
 * writes a sourced research brief to `research_data`. On refinement passes
 * it is steered by `additional_research_needed`.
 *
 * Tools:
 * - tavily_search: Tavily web search
 */
import type { LlmAgent } from '@google/adk';
import { createTavilySearchAdkTool } from '../tools/adk-tools.js';
import type { SearchFunction } from '../tools/tavily-search.js';
import { createStageAgent } from './stage.js';
import type { StageDefinition } from './types.js';

export const RESEARCHER_STAGE: StageDefinition = {
  role: 'researcher',
  name: 'ResearchAgent',
  description: 'Gathers sourced early-life biographical facts using web search.',
  reads: ['person_name', 'additional_research_needed'],
  outputKey: 'research_data',
};

export function createResearchAgent({
  model,
  instruction,
  search,
}: {
  model: string;
  instruction: string;
  search: SearchFunction;
}): LlmAgent {
  return createStageAgent(RESEARCHER_STAGE, {
    model,
    instruction,
    tools: [createTavilySearchAdkTool(search)],
  });
}
