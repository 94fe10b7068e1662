/**
 * Stage Agent Factory
 *
 * Builds the LlmAgent for one pipeline role. Every stage writes its final
 * model text to its output key and may not hand control to another agent;
 * sequencing belongs to the workflow, never to the model.
 *
 * Dependencies:
 * - @google/adk: LlmAgent
 */
import { LlmAgent, type BaseTool } from '@google/adk';
import type { StageDefinition } from './types.js';

export interface StageAgentOptions {
  model: string;
  instruction: string;
  tools?: BaseTool[];
}

export function createStageAgent(
  definition: StageDefinition,
  { model, instruction, tools = [] }: StageAgentOptions
): LlmAgent {
  return new LlmAgent({
    name: definition.name,
    model,
    description: definition.description,
    instruction,
    tools,
    outputKey: definition.outputKey,
    disallowTransferToParent: true,
    disallowTransferToPeers: true,
  });
}
