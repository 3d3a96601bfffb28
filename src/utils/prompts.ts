import { CompletionMessage } from '../types/agent';
import { Interaction } from '../types/memory';

export interface PromptInput {
  persona: string;
  contextSummary?: string | null;
  openingLine?: string | null;
  history: Interaction[];
  historyWindow: number;
  utterance: string;
}

/**
 * Ordered message list for the completion call: persona, context briefing,
 * reopening line, recent turns, then the new utterance.
 */
export function buildCompletionMessages(input: PromptInput): CompletionMessage[] {
  const messages: CompletionMessage[] = [{ role: 'system', content: input.persona }];

  if (input.contextSummary) {
    messages.push({ role: 'system', content: input.contextSummary });
  }
  if (input.openingLine) {
    messages.push({ role: 'assistant', content: input.openingLine });
  }

  const recent = input.historyWindow > 0 ? input.history.slice(-input.historyWindow) : [];
  for (const turn of recent) {
    messages.push({ role: 'user', content: turn.userText });
    // turns whose reply never arrived carry no assistant line
    if (turn.botText !== null) {
      messages.push({ role: 'assistant', content: turn.botText });
    }
  }

  messages.push({ role: 'user', content: input.utterance });
  return messages;
}
