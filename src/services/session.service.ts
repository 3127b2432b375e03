import { runToolLoop } from './dispatch.service';
import { ThreadStore } from './thread.store';
import { ToolExecutor } from './tools/tool.dispatcher';
import { Message, ModelProvider, TurnResult } from '../types/conversation';
import { KeyedMutex } from '../utils/keyedMutex';
import { NotFoundError, TurnTimeoutError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface SessionServiceOptions {
  threads: ThreadStore;
  provider: ModelProvider;
  executor: ToolExecutor;
  locks: KeyedMutex;
  maxToolRounds: number;
  turnTimeoutMs: number;
}

/**
 * Entry point for conversation turns. Turns on one thread are serialised; a turn either
 * commits all of its assistant and tool messages or, on failure, none of them.
 */
export class SessionService {
  private readonly threads: ThreadStore;
  private readonly provider: ModelProvider;
  private readonly executor: ToolExecutor;
  private readonly locks: KeyedMutex;

  constructor(private readonly options: SessionServiceOptions) {
    this.threads = options.threads;
    this.provider = options.provider;
    this.executor = options.executor;
    this.locks = options.locks;
  }

  async handleTurn(threadId: string, userText: string): Promise<TurnResult> {
    return this.locks.runExclusive(threadId, async () => {
      const thread = this.threads.getOrCreate(threadId);
      thread.messages.push({ role: 'user', content: userText, createdAt: new Date().toISOString() });
      logger.info('Turn started', { threadId, historyLength: thread.messages.length });

      const controller = new AbortController();
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          controller.abort();
          reject(new TurnTimeoutError(this.options.turnTimeoutMs));
        }, this.options.turnTimeoutMs);
      });

      try {
        const result = await Promise.race([
          runToolLoop({
            history: thread.messages,
            provider: this.provider,
            executor: this.executor,
            services: thread.services,
            maxRounds: this.options.maxToolRounds,
            signal: controller.signal,
            threadId,
          }),
          timeout,
        ]);

        thread.messages.push(...result.messages);
        this.threads.touch(thread);
        return { threadId, response: result.response, timestamp: new Date().toISOString() };
      } catch (error) {
        logger.error('Turn failed, discarding its partial messages', { threadId, error: errorMessage(error) });
        if (controller.signal.aborted) {
          throw new TurnTimeoutError(this.options.turnTimeoutMs);
        }
        controller.abort();
        throw error;
      } finally {
        clearTimeout(timer);
      }
    });
  }

  getHistory(threadId: string): Message[] {
    const thread = this.threads.get(threadId);
    if (!thread) {
      throw new NotFoundError(`Thread ${threadId} not found`);
    }
    return [...thread.messages];
  }

  /** Waits for any turn in progress on the thread, so a finishing turn cannot revive it. */
  async deleteThread(threadId: string): Promise<boolean> {
    return this.locks.runExclusive(threadId, async () => this.threads.delete(threadId));
  }

  stats(): { activeThreads: number } {
    return { activeThreads: this.threads.size };
  }
}
