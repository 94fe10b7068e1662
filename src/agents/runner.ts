/**
 * Workflow Session (ADK)
 *
 * Binds a composed workflow to an ADK InMemoryRunner and one session keyed
 * by (app name, user id, session id). Seeds state through a state-delta
 * event, streams runner events as WorkflowEvents and reads state back after
 * the run.
 *
 * Dependencies:
 * - @google/adk: InMemoryRunner, createEvent, createEventActions
 * - @google/genai: Content type for message formatting
 */
import { InMemoryRunner, createEvent, createEventActions, type Event } from '@google/adk';
import type { Content } from '@google/genai';
import { SessionSetupError } from '../utils/errors.js';
import { agentLogger } from '../utils/logger.js';
import {
  readSessionState,
  type ComposedWorkflow,
  type SessionKey,
  type SessionState,
  type WorkflowEvent,
  type WorkflowSession,
  type WorkflowSessionFactory,
} from './types.js';

/**
 * Creates a Content object from text for use with the runner
 */
export function createUserContent(text: string): Content {
  return {
    role: 'user',
    parts: [{ text }],
  };
}

/**
 * Joins the visible text parts of an event; thought parts are skipped
 */
export function eventText(event: Event): string | undefined {
  const text =
    event.content?.parts
      ?.filter((part) => !part.thought)
      .map((part) => part.text ?? '')
      .join('') ?? '';
  return text || undefined;
}

export function toWorkflowEvent(event: Event, isFinal: boolean): WorkflowEvent {
  return {
    id: event.id,
    author: event.author ?? 'unknown',
    text: eventText(event),
    isFinal,
  };
}

export class AdkWorkflowSession implements WorkflowSession {
  private constructor(
    readonly key: SessionKey,
    private readonly runner: InMemoryRunner,
    private readonly workflow: ComposedWorkflow
  ) {}

  static async open(workflow: ComposedWorkflow, key: SessionKey): Promise<AdkWorkflowSession> {
    const runner = new InMemoryRunner({
      agent: workflow.root,
      appName: key.appName,
    });

    await runner.sessionService.createSession({
      appName: key.appName,
      userId: key.userId,
      sessionId: key.sessionId,
      state: {},
    });

    agentLogger.debug(`[Runner] Session ${key.sessionId} created for ${key.appName}/${key.userId}`);
    return new AdkWorkflowSession(key, runner, workflow);
  }

  async updateState(delta: SessionState): Promise<void> {
    const session = await this.runner.sessionService.getSession({
      appName: this.key.appName,
      userId: this.key.userId,
      sessionId: this.key.sessionId,
    });
    if (!session) {
      throw new SessionSetupError(`Session ${this.key.sessionId} not found`);
    }

    await this.runner.sessionService.appendEvent({
      session,
      event: createEvent({
        author: 'user',
        actions: createEventActions({ stateDelta: delta }),
      }),
    });
  }

  async *run(message: string): AsyncGenerator<WorkflowEvent, void, undefined> {
    let eventIndex = 0;

    for await (const event of this.runner.runAsync({
      userId: this.key.userId,
      sessionId: this.key.sessionId,
      newMessage: createUserContent(message),
    })) {
      eventIndex++;
      const isFinal = this.workflow.isRunComplete(event);
      agentLogger.debug(
        `[Runner] Event #${eventIndex} from ${event.author}, parts: ${event.content?.parts?.length ?? 0}, isFinal: ${isFinal}`
      );
      yield toWorkflowEvent(event, isFinal);
    }
  }

  async getState(): Promise<SessionState> {
    const session = await this.runner.sessionService.getSession({
      appName: this.key.appName,
      userId: this.key.userId,
      sessionId: this.key.sessionId,
    });
    return session ? readSessionState(session.state) : {};
  }
}

export const openAdkWorkflowSession: WorkflowSessionFactory = (workflow, key) =>
  AdkWorkflowSession.open(workflow, key);
