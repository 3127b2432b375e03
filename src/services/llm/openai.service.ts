import OpenAI from 'openai';
import { logger } from '../../utils/logger';
import { CompletionOptions, Message, ModelProvider, ModelResponse, ToolSchema } from '../../types/conversation';
import { ServiceError, errorMessage, errorStatus, toError } from '../../utils/errors';

export interface OpenAIProviderConfig {
  apiKey?: string;
  model: string;
  temperature: number;
  maxRetries?: number;
  /** Base delay for 429 backoff; doubles per attempt. */
  retryDelayMs?: number;
}

export function toOpenAIMessages(history: Message[]): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  return history.map((message): OpenAI.Chat.Completions.ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        return message.toolCalls && message.toolCalls.length > 0
          ? {
              role: 'assistant',
              content: message.content,
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id,
                type: 'function' as const,
                function: { name: call.name, arguments: call.arguments },
              })),
            }
          : { role: 'assistant', content: message.content ?? '' };
      case 'tool':
        return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
    }
  });
}

export function toOpenAITools(tools: ToolSchema[]): OpenAI.Chat.Completions.ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: 'function',
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  }));
}

export class OpenAIProvider implements ModelProvider {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(private readonly config: OpenAIProviderConfig) {
    if (!config.apiKey) {
      logger.warn('OpenAI API key not configured');
    }
    // Backoff is handled here so rate limits surface in our logs.
    this.client = new OpenAI({ apiKey: config.apiKey ?? '', maxRetries: 0 });
  }

  async complete(history: Message[], tools: ToolSchema[], options: CompletionOptions = {}): Promise<ModelResponse> {
    const maxRetries = this.config.maxRetries ?? 3;
    const baseDelay = this.config.retryDelayMs ?? 1000;

    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.client.chat.completions.create(
          {
            model: this.config.model,
            messages: toOpenAIMessages(history),
            tools: tools.length > 0 ? toOpenAITools(tools) : undefined,
            temperature: this.config.temperature,
          },
          { signal: options.signal }
        );

        const message = response.choices[0]?.message;
        const toolCalls = (message?.tool_calls ?? []).map((call) => ({
          id: call.id,
          name: call.function.name,
          arguments: call.function.arguments,
        }));

        logger.debug('OpenAI response generated', {
          attempt,
          toolCalls: toolCalls.length,
          tokens: { prompt: response.usage?.prompt_tokens ?? 0, completion: response.usage?.completion_tokens ?? 0 },
        });
        return { content: message?.content ?? null, toolCalls };
      } catch (error) {
        if (errorStatus(error) === 429 && attempt < maxRetries && !options.signal?.aborted) {
          const delay = Math.pow(2, attempt - 1) * baseDelay;
          logger.warn('OpenAI rate limited, backing off', { attempt, delay });
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        logger.error('OpenAI error', { attempt, status: errorStatus(error), error: errorMessage(error) });
        throw new ServiceError('OpenAI', 'complete', toError(error), errorStatus(error) === 429);
      }
    }
  }
}
