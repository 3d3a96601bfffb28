import { buildCompletionMessages } from '../../src/utils/prompts';
import { Interaction } from '../../src/types/memory';

const at = '2024-06-05T15:00:00.000Z';

describe('buildCompletionMessages', () => {
  const history: Interaction[] = [
    { timestamp: at, userText: 'first', botText: 'reply one' },
    { timestamp: at, userText: 'second', botText: null },
    { timestamp: at, userText: 'third', botText: 'reply three' },
  ];

  it('should order persona, briefing, opening line, history and the new message', () => {
    expect(
      buildCompletionMessages({
        persona: 'persona',
        contextSummary: 'CONVERSATION CONTEXT: Customer is budget-conscious.',
        openingLine: 'Welcome back!',
        history,
        historyWindow: 2,
        utterance: 'what about lighting?',
      })
    ).toEqual([
      { role: 'system', content: 'persona' },
      { role: 'system', content: 'CONVERSATION CONTEXT: Customer is budget-conscious.' },
      { role: 'assistant', content: 'Welcome back!' },
      { role: 'user', content: 'second' },
      { role: 'user', content: 'third' },
      { role: 'assistant', content: 'reply three' },
      { role: 'user', content: 'what about lighting?' },
    ]);
  });

  it('should skip an empty briefing and a missing opening line', () => {
    expect(
      buildCompletionMessages({ persona: 'persona', contextSummary: '', openingLine: null, history: [], historyWindow: 10, utterance: 'hi' })
    ).toEqual([
      { role: 'system', content: 'persona' },
      { role: 'user', content: 'hi' },
    ]);
  });
});
