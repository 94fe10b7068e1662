/**
 * Agent Type Definitions
 *
 * Contracts shared by the stage agents, the workflow composer, the session
 * adapter and the research driver.
 */
import type { BaseAgent, Event, LlmAgent } from '@google/adk';
import type { AgentName, WorkflowMode } from '../config/index.js';

export type StageRole = AgentName;

export const STATE_KEYS = [
  'person_name',
  'research_data',
  'answer_summary',
  'review_result',
  'refinement_action',
  'additional_research_needed',
  'refinement_outcome',
] as const;

export type StateKey = (typeof STATE_KEYS)[number];

/**
 * The text fields the pipeline keeps in ADK session state
 */
export type SessionState = Partial<Record<StateKey, string>>;

/**
 * Picks the known text fields out of a raw ADK state record
 */
export function readSessionState(raw: Record<string, unknown>): SessionState {
  const state: SessionState = {};
  for (const key of STATE_KEYS) {
    const value = raw[key];
    if (typeof value === 'string') {
      state[key] = value;
    }
  }
  return state;
}

/**
 * One pipeline role: consumes the state keys in `reads` and writes its
 * model output to `outputKey`.
 */
export interface StageDefinition {
  readonly role: StageRole;
  readonly name: string;
  readonly description: string;
  readonly reads: readonly StateKey[];
  readonly outputKey: StateKey;
}

export type StageAgents = Record<StageRole, LlmAgent>;

export interface ComposedWorkflow {
  readonly mode: WorkflowMode;
  readonly root: BaseAgent;
  readonly stages: StageAgents;
  /** True for the event that ends one run of the workflow */
  isRunComplete(event: Event): boolean;
}

/**
 * Normalized runner event handed to the driver
 */
export interface WorkflowEvent {
  id: string;
  author: string;
  text?: string;
  isFinal: boolean;
}

export interface SessionKey {
  appName: string;
  userId: string;
  sessionId: string;
}

/**
 * A conversation session bound to one composed workflow.
 */
export interface WorkflowSession {
  readonly key: SessionKey;
  updateState(delta: SessionState): Promise<void>;
  run(message: string): AsyncGenerator<WorkflowEvent, void, undefined>;
  getState(): Promise<SessionState>;
}

export type WorkflowSessionFactory = (
  workflow: ComposedWorkflow,
  key: SessionKey
) => Promise<WorkflowSession>;
