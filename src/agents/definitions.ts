import { ANSWERER_STAGE } from './answerer.js';
import { REFINER_STAGE } from './refiner.js';
import { RESEARCHER_STAGE } from './researcher.js';
import { REVIEWER_STAGE } from './reviewer.js';
import type { SessionState, StageDefinition, StageRole, StateKey } from './types.js';

export const STAGE_DEFINITIONS: Record<StageRole, StageDefinition> = {
  researcher: RESEARCHER_STAGE,
  answerer: ANSWERER_STAGE,
  reviewer: REVIEWER_STAGE,
  refiner: REFINER_STAGE,
};

/**
 * The keys a stage reads that are not yet present in state
 */
export function missingInputs(role: StageRole, state: SessionState): StateKey[] {
  return STAGE_DEFINITIONS[role].reads.filter((key) => state[key] === undefined);
}
