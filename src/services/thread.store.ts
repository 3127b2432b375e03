import { IntakeService } from './intake/intake.service';
import { SubmissionStore } from './intake/submission.store';
import { LeadSubmissionService } from './crm/lead.submission';
import { Message } from '../types/conversation';
import { CRMAdapter } from '../types/crm';
import { PolicyBackend } from '../types/ams360';
import { logger } from '../utils/logger';

export interface ThreadServices {
  intake: IntakeService;
  policies: PolicyBackend;
  crm: CRMAdapter;
}

export interface ConversationThread {
  threadId: string;
  messages: Message[];
  services: ThreadServices;
  createdAt: number;
  lastActiveAt: number;
}

export interface SharedServices {
  store: SubmissionStore;
  policies: PolicyBackend;
  crm: CRMAdapter;
}

/** Each thread gets its own intake session; backend clients are shared. */
export function threadServicesFactory(shared: SharedServices): (threadId: string) => ThreadServices {
  const leads = new LeadSubmissionService(shared.crm);
  return (threadId) => ({
    intake: new IntakeService({ store: shared.store, leads, threadId }),
    policies: shared.policies,
    crm: shared.crm,
  });
}

export interface ThreadStoreOptions {
  systemPrompt: string;
  createServices: (threadId: string) => ThreadServices;
  maxThreads: number;
  idleTtlMs: number;
  /** Threads for which this returns true are never evicted. */
  isPinned?: (threadId: string) => boolean;
  now?: () => number;
}

/**
 * In-memory thread table. Iteration order of the map is recency order: every access
 * moves the thread to the end, so eviction walks from the front.
 */
export class ThreadStore {
  private readonly threads = new Map<string, ConversationThread>();
  private readonly now: () => number;

  constructor(private readonly options: ThreadStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.threads.size;
  }

  has(threadId: string): boolean {
    return this.threads.has(threadId);
  }

  get(threadId: string): ConversationThread | undefined {
    return this.threads.get(threadId);
  }

  getOrCreate(threadId: string): ConversationThread {
    const existing = this.threads.get(threadId);
    if (existing) {
      this.touch(existing);
      return existing;
    }

    this.evict();

    const now = this.now();
    const thread: ConversationThread = {
      threadId,
      messages: [{ role: 'system', content: this.options.systemPrompt, createdAt: new Date(now).toISOString() }],
      services: this.options.createServices(threadId),
      createdAt: now,
      lastActiveAt: now,
    };
    this.threads.set(threadId, thread);
    logger.info('Thread created', { threadId, activeThreads: this.threads.size });
    return thread;
  }

  delete(threadId: string): boolean {
    const deleted = this.threads.delete(threadId);
    if (deleted) {
      logger.info('Thread deleted', { threadId });
    }
    return deleted;
  }

  /** Marks a thread as most recently used. Threads no longer in the store stay gone. */
  touch(thread: ConversationThread): void {
    if (this.threads.get(thread.threadId) !== thread) return;
    thread.lastActiveAt = this.now();
    this.threads.delete(thread.threadId);
    this.threads.set(thread.threadId, thread);
  }

  /** Drops idle threads, then the least recently used ones until there is room for one more. */
  evict(): void {
    const now = this.now();
    const pinned = this.options.isPinned ?? (() => false);

    for (const [threadId, thread] of this.threads) {
      if (now - thread.lastActiveAt >= this.options.idleTtlMs && !pinned(threadId)) {
        this.threads.delete(threadId);
        logger.info('Evicted idle thread', { threadId });
      }
    }

    for (const threadId of this.threads.keys()) {
      if (this.threads.size < this.options.maxThreads) break;
      if (pinned(threadId)) continue;
      this.threads.delete(threadId);
      logger.info('Evicted least recently used thread', { threadId });
    }
  }
}
