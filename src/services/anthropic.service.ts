import Anthropic from '@anthropic-ai/sdk';
import { CompletionClient, CompletionMessage } from '../types/agent';
import { CompletionOptions, completeWithRetries } from './completion.service';

interface AnthropicTurn {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * The Messages API takes the system text separately and wants the
 * conversation to open with a user turn, so system lines and any assistant
 * lines ahead of the first user line are folded into the system text.
 */
export function splitSystem(messages: CompletionMessage[]): { system: string; turns: AnthropicTurn[] } {
  const system: string[] = [];
  const turns: AnthropicTurn[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      system.push(message.content);
    } else if (message.role === 'assistant' && turns.length === 0) {
      system.push(`You opened this session with: "${message.content}"`);
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }

  return { system: system.join('\n\n'), turns };
}

export class AnthropicService implements CompletionClient {
  readonly provider = 'Anthropic';
  private readonly client: Anthropic;

  constructor(private readonly options: CompletionOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey });
  }

  async complete(messages: CompletionMessage[]): Promise<string> {
    const { system, turns } = splitSystem(messages);

    return completeWithRetries(
      this.provider,
      async () => {
        const response = await this.client.messages.create({
          model: this.options.model,
          system: system.length > 0 ? system : undefined,
          messages: turns,
          temperature: 0.7,
          max_tokens: this.options.maxTokens ?? 300,
        });

        return response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('');
      },
      this.options
    );
  }
}
