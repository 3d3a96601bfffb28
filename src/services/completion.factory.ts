import { CompletionClient } from '../types/agent';
import { AnthropicService } from './anthropic.service';
import { OpenAIService } from './openai.service';

export interface CompletionSettings {
  LLM_PROVIDER: 'openai' | 'anthropic';
  OPENAI_API_KEY?: string;
  OPENAI_MODEL: string;
  ANTHROPIC_API_KEY?: string;
  ANTHROPIC_MODEL: string;
}

export class CompletionFactory {
  static create(settings: CompletionSettings): CompletionClient {
    switch (settings.LLM_PROVIDER) {
      case 'openai':
        if (!settings.OPENAI_API_KEY) throw new Error('OPENAI_API_KEY is not set');
        return new OpenAIService({ apiKey: settings.OPENAI_API_KEY, model: settings.OPENAI_MODEL });
      case 'anthropic':
        if (!settings.ANTHROPIC_API_KEY) throw new Error('ANTHROPIC_API_KEY is not set');
        return new AnthropicService({ apiKey: settings.ANTHROPIC_API_KEY, model: settings.ANTHROPIC_MODEL });
    }
  }
}
