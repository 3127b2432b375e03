import type { ThreadServices } from './thread.store';
import type { ToolExecutor } from './tools/tool.dispatcher';
import { AssistantMessage, Message, ModelProvider, ToolMessage } from '../types/conversation';
import { ToolLoopExceededError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ToolLoopOptions {
  /** Thread history up to and including the new user message. Not modified. */
  history: Message[];
  provider: ModelProvider;
  executor: ToolExecutor;
  services: ThreadServices;
  maxRounds: number;
  signal?: AbortSignal;
  threadId?: string;
  now?: () => string;
}

export interface ToolLoopResult {
  /** Messages produced by this turn, ending with the terminal assistant message. */
  messages: Message[];
  response: string;
  rounds: number;
}

/**
 * Alternates model inference and tool execution until the model answers without tool
 * calls. Tool calls within one response run sequentially, in the order issued.
 */
export async function runToolLoop(options: ToolLoopOptions): Promise<ToolLoopResult> {
  const { provider, executor, services, maxRounds, signal, threadId } = options;
  const now = options.now ?? (() => new Date().toISOString());
  const tools = executor.schemas();
  const working: Message[] = [...options.history];
  const produced: Message[] = [];

  const append = (message: Message) => {
    working.push(message);
    produced.push(message);
  };

  for (let rounds = 0; ; rounds++) {
    signal?.throwIfAborted();
    const reply = await provider.complete(working, tools, { signal });
    signal?.throwIfAborted();

    if (reply.toolCalls.length === 0) {
      const final: AssistantMessage = { role: 'assistant', content: reply.content ?? '', createdAt: now() };
      append(final);
      logger.info('Turn completed', { threadId, rounds, provider: provider.name });
      return { messages: produced, response: final.content ?? '', rounds };
    }

    if (rounds >= maxRounds) {
      logger.warn('Tool round limit reached', { threadId, maxRounds });
      throw new ToolLoopExceededError(maxRounds);
    }

    append({ role: 'assistant', content: reply.content, toolCalls: reply.toolCalls, createdAt: now() });

    for (const call of reply.toolCalls) {
      signal?.throwIfAborted();
      const outcome = await executor.execute(call, services);
      const result: ToolMessage = {
        role: 'tool',
        toolCallId: call.id,
        name: call.name,
        content: outcome.message,
        createdAt: now(),
      };
      append(result);
    }
  }
}
