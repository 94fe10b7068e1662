import { describe, it, expect } from 'vitest';
import { createEvent } from '@google/adk';
import { createUserContent, eventText, toWorkflowEvent } from '../../src/agents/runner.js';

describe('createUserContent', () => {
  it('wraps text as a user message', () => {
    expect(createUserContent('hello')).toEqual({ role: 'user', parts: [{ text: 'hello' }] });
  });
});

describe('eventText', () => {
  it('joins the text parts', () => {
    const event = createEvent({
      author: 'AnswerAgent',
      content: { role: 'model', parts: [{ text: 'Born in ' }, { text: 'Leeds.' }] },
    });

    expect(eventText(event)).toBe('Born in Leeds.');
  });

  it('skips thought parts', () => {
    const event = createEvent({
      author: 'AnswerAgent',
      content: {
        role: 'model',
        parts: [{ text: 'planning the answer', thought: true }, { text: 'Final text' }],
      },
    });

    expect(eventText(event)).toBe('Final text');
  });

  it('returns undefined for an event without text', () => {
    expect(eventText(createEvent({ author: 'user' }))).toBeUndefined();
  });
});

describe('toWorkflowEvent', () => {
  it('keeps id, author, text and the final flag', () => {
    const event = createEvent({
      id: 'event-1',
      author: 'IterativeResearchWorkflow',
      content: { role: 'model', parts: [{ text: 'summary' }] },
    });

    expect(toWorkflowEvent(event, true)).toEqual({
      id: 'event-1',
      author: 'IterativeResearchWorkflow',
      text: 'summary',
      isFinal: true,
    });
  });
});
