import { Env } from '../../config/env';
import { ModelProvider } from '../../types/conversation';
import { AnthropicProvider } from './anthropic.service';
import { OpenAIProvider } from './openai.service';

export function createModelProvider(config: Env): ModelProvider {
  switch (config.LLM_PROVIDER) {
    case 'openai':
      return new OpenAIProvider({
        apiKey: config.OPENAI_API_KEY,
        model: config.OPENAI_MODEL,
        temperature: config.LLM_TEMPERATURE,
      });
    case 'anthropic':
      return new AnthropicProvider({
        apiKey: config.ANTHROPIC_API_KEY,
        model: config.ANTHROPIC_MODEL,
        temperature: config.LLM_TEMPERATURE,
      });
  }
}
