import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { CompletionClient, CompletionMessage } from '../types/agent';
import { CompletionOptions, completeWithRetries } from './completion.service';

function toOpenAIMessage(message: CompletionMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIService implements CompletionClient {
  readonly provider = 'OpenAI';
  private readonly client: OpenAI;

  constructor(private readonly options: CompletionOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey });
  }

  async complete(messages: CompletionMessage[]): Promise<string> {
    return completeWithRetries(
      this.provider,
      async () => {
        const response = await this.client.chat.completions.create({
          model: this.options.model,
          messages: messages.map(toOpenAIMessage),
          temperature: 0.7,
          max_tokens: this.options.maxTokens ?? 300,
        });
        return response.choices[0]?.message?.content ?? '';
      },
      this.options
    );
  }
}
