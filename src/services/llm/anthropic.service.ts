import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../utils/logger';
import { CompletionOptions, Message, ModelProvider, ModelResponse, ToolSchema } from '../../types/conversation';
import { ServiceError, errorMessage, errorStatus, toError } from '../../utils/errors';

type ContentBlocks = Exclude<Anthropic.MessageParam['content'], string>;

export interface AnthropicProviderConfig {
  apiKey?: string;
  model: string;
  temperature: number;
  maxTokens?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

export interface AnthropicRequest {
  system: string;
  messages: Anthropic.MessageParam[];
}

function parseInput(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return {};
  }
}

/**
 * The messages API takes the system prompt separately, wants tool results inside user
 * turns and rejects two consecutive turns with the same role, so adjacent turns merge.
 */
export function toAnthropicRequest(history: Message[]): AnthropicRequest {
  const system: string[] = [];
  const messages: Anthropic.MessageParam[] = [];

  const push = (role: 'user' | 'assistant', blocks: ContentBlocks) => {
    const last = messages[messages.length - 1];
    if (last && last.role === role && Array.isArray(last.content)) {
      last.content.push(...blocks);
      return;
    }
    messages.push({ role, content: blocks });
  };

  for (const message of history) {
    switch (message.role) {
      case 'system':
        system.push(message.content);
        break;
      case 'user':
        push('user', [{ type: 'text', text: message.content }]);
        break;
      case 'assistant': {
        const blocks: ContentBlocks = [];
        if (message.content) blocks.push({ type: 'text', text: message.content });
        for (const call of message.toolCalls ?? []) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: parseInput(call.arguments) });
        }
        if (blocks.length > 0) push('assistant', blocks);
        break;
      }
      case 'tool':
        push('user', [{ type: 'tool_result', tool_use_id: message.toolCallId, content: message.content }]);
        break;
    }
  }

  return { system: system.join('\n\n'), messages };
}

export function toAnthropicTools(tools: ToolSchema[]): Anthropic.Tool[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: tool.parameters,
  }));
}

export class AnthropicProvider implements ModelProvider {
  readonly name = 'anthropic';
  private readonly client: Anthropic;

  constructor(private readonly config: AnthropicProviderConfig) {
    if (!config.apiKey) {
      logger.warn('Anthropic API key not configured');
    }
    this.client = new Anthropic({ apiKey: config.apiKey ?? null, maxRetries: 0 });
  }

  async complete(history: Message[], tools: ToolSchema[], options: CompletionOptions = {}): Promise<ModelResponse> {
    const maxRetries = this.config.maxRetries ?? 3;
    const baseDelay = this.config.retryDelayMs ?? 1000;
    const { system, messages } = toAnthropicRequest(history);

    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.client.messages.create(
          {
            model: this.config.model,
            system: system || undefined,
            messages,
            tools: tools.length > 0 ? toAnthropicTools(tools) : undefined,
            temperature: this.config.temperature,
            max_tokens: this.config.maxTokens ?? 1024,
          },
          { signal: options.signal }
        );

        const content = response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('')
          .trim();
        const toolCalls = response.content.flatMap((block) =>
          block.type === 'tool_use' ? [{ id: block.id, name: block.name, arguments: JSON.stringify(block.input) }] : []
        );

        logger.debug('Anthropic response generated', {
          attempt,
          toolCalls: toolCalls.length,
          tokens: { prompt: response.usage?.input_tokens ?? 0, completion: response.usage?.output_tokens ?? 0 },
        });
        return { content: content || null, toolCalls };
      } catch (error) {
        if (errorStatus(error) === 429 && attempt < maxRetries && !options.signal?.aborted) {
          const delay = Math.pow(2, attempt - 1) * baseDelay;
          logger.warn('Anthropic rate limited, backing off', { attempt, delay });
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        logger.error('Anthropic error', { attempt, status: errorStatus(error), error: errorMessage(error) });
        throw new ServiceError('Anthropic', 'complete', toError(error), errorStatus(error) === 429);
      }
    }
  }
}
