import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { SessionService } from '../../src/services/session.service';
import { ThreadServices, ThreadStore, threadServicesFactory } from '../../src/services/thread.store';
import { ToolDispatcher, ToolExecutor } from '../../src/services/tools/tool.dispatcher';
import { IntakeService } from '../../src/services/intake/intake.service';
import { SubmissionStore } from '../../src/services/intake/submission.store';
import { CompletionOptions, Message, ModelResponse } from '../../src/types/conversation';
import { KeyedMutex } from '../../src/utils/keyedMutex';
import { NotFoundError, ServiceError, ToolLoopExceededError, TurnTimeoutError } from '../../src/utils/errors';
import { ScriptedProvider, Reply, answer, requestTools, toolCall } from '../helpers/scriptedProvider';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

function createServices(threadId: string): ThreadServices {
  return {
    intake: new IntakeService({ store: new SubmissionStore('unused'), threadId }),
    policies: { lookupPolicyByNumber: jest.fn(), getCustomerPolicies: jest.fn(), getCustomerDetails: jest.fn() },
    crm: { createLead: jest.fn(), searchContacts: jest.fn() },
  };
}

const executor: ToolExecutor = {
  schemas: () => [],
  execute: async (call) => ({ ok: true, message: `ran ${call.name}` }),
};

function setup(replies: Reply[], options: { maxToolRounds?: number; turnTimeoutMs?: number } = {}) {
  const locks = new KeyedMutex();
  const threads = new ThreadStore({
    systemPrompt: 'system prompt',
    createServices,
    maxThreads: 100,
    idleTtlMs: 60_000,
    isPinned: (threadId) => locks.isLocked(threadId),
  });
  const provider = new ScriptedProvider(replies);
  const sessions = new SessionService({
    threads,
    provider,
    executor,
    locks,
    maxToolRounds: options.maxToolRounds ?? 8,
    turnTimeoutMs: options.turnTimeoutMs ?? 5_000,
  });
  return { sessions, provider, threads };
}

function roles(messages: Message[]): string[] {
  return messages.map((m) => m.role);
}

function hangUntilAborted(_history: Message[], options: CompletionOptions): Promise<ModelResponse> {
  return new Promise((_resolve, reject) => {
    options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });
}

function delayed(reply: ModelResponse, ms: number) {
  return () => new Promise<ModelResponse>((resolve) => setTimeout(() => resolve(reply), ms));
}

describe('SessionService', () => {
  it('should create a thread on first contact and answer', async () => {
    const { sessions } = setup([answer('Hello! How can I help?')]);

    const result = await sessions.handleTurn('t-1', 'hi');

    expect(result.threadId).toBe('t-1');
    expect(result.response).toBe('Hello! How can I help?');
    expect(roles(sessions.getHistory('t-1'))).toEqual(['system', 'user', 'assistant']);
    expect(sessions.getHistory('t-1')[0]).toMatchObject({ role: 'system', content: 'system prompt' });
  });

  it('should keep tool messages from a completed turn', async () => {
    const { sessions } = setup([requestTools(toolCall('lookup', {}, 'c1')), answer('Done.')]);

    await sessions.handleTurn('t-1', 'look it up');

    expect(roles(sessions.getHistory('t-1'))).toEqual(['system', 'user', 'assistant', 'tool', 'assistant']);
  });

  it('should discard the partial turn when the model fails', async () => {
    const failure = new ServiceError('OpenAI', 'complete', new Error('socket hang up'), false);
    const { sessions } = setup([
      requestTools(toolCall('lookup', {}, 'c1')),
      async () => {
        throw failure;
      },
    ]);

    await expect(sessions.handleTurn('t-1', 'look it up')).rejects.toBe(failure);

    const history = sessions.getHistory('t-1');
    expect(roles(history)).toEqual(['system', 'user']);
    expect(history[1]).toMatchObject({ content: 'look it up' });
  });

  it('should discard the partial turn when the tool round limit is hit', async () => {
    const { sessions } = setup(
      [requestTools(toolCall('lookup', {}, 'c1')), requestTools(toolCall('lookup', {}, 'c2'))],
      { maxToolRounds: 1 }
    );

    await expect(sessions.handleTurn('t-1', 'loop')).rejects.toBeInstanceOf(ToolLoopExceededError);
    expect(roles(sessions.getHistory('t-1'))).toEqual(['system', 'user']);
  });

  it('should time out a slow turn and release the thread', async () => {
    const { sessions } = setup([hangUntilAborted, answer('Back again.')], { turnTimeoutMs: 20 });

    await expect(sessions.handleTurn('t-1', 'slow')).rejects.toBeInstanceOf(TurnTimeoutError);
    await expect(sessions.handleTurn('t-1', 'again')).resolves.toMatchObject({ response: 'Back again.' });

    expect(roles(sessions.getHistory('t-1'))).toEqual(['system', 'user', 'user', 'assistant']);
  });

  it('should run turns on the same thread one after another', async () => {
    const { sessions, provider } = setup([delayed(answer('first'), 20), answer('second')]);

    const [a, b] = await Promise.all([sessions.handleTurn('t-1', 'one'), sessions.handleTurn('t-1', 'two')]);

    expect(a.response).toBe('first');
    expect(b.response).toBe('second');
    expect(provider.calls[0]).toHaveLength(2);
    expect(provider.calls[1]).toHaveLength(4);
    expect(provider.calls[1][2]).toMatchObject({ role: 'assistant', content: 'first' });
  });

  it('should not block one thread on another', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const byThread = async (history: Message[]) => {
      const last = history[history.length - 1];
      if (last.content === 'wait') {
        await gate;
        return answer('slow thread');
      }
      return answer('fast thread');
    };
    const { sessions } = setup([byThread, byThread]);

    const slow = sessions.handleTurn('t-slow', 'wait');
    const fast = await sessions.handleTurn('t-fast', 'go');

    expect(fast.response).toBe('fast thread');
    release();
    await expect(slow).resolves.toMatchObject({ response: 'slow thread' });
  });

  it('should not let a finishing turn bring back a deleted thread', async () => {
    const { sessions, threads } = setup([delayed(answer('late reply'), 30)]);

    const turn = sessions.handleTurn('t-1', 'hi');
    await new Promise((resolve) => setTimeout(resolve, 5));
    const deleted = sessions.deleteThread('t-1');

    await expect(turn).resolves.toMatchObject({ response: 'late reply' });
    await expect(deleted).resolves.toBe(true);
    expect(threads.has('t-1')).toBe(false);
    expect(() => sessions.getHistory('t-1')).toThrow(NotFoundError);
  });

  it('should submit once when a timed-out turn is retried during the CRM call', async () => {
    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const crm = {
      createLead: jest.fn(async () => {
        await gate;
        return 'L-1';
      }),
      searchContacts: jest.fn(),
    };
    const dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'intake-session-'));
    const locks = new KeyedMutex();
    const threads = new ThreadStore({
      systemPrompt: 'system prompt',
      createServices: threadServicesFactory({
        store: new SubmissionStore(dataDir),
        policies: { lookupPolicyByNumber: jest.fn(), getCustomerPolicies: jest.fn(), getCustomerDetails: jest.fn() },
        crm,
      }),
      maxThreads: 10,
      idleTtlMs: 60_000,
      isPinned: (threadId) => locks.isLocked(threadId),
    });
    const sessions = new SessionService({
      threads,
      provider: new ScriptedProvider([
        requestTools(toolCall('set_user_action', { action_type: 'add', insurance_type: 'flood' }, 'c1')),
        requestTools(
          toolCall(
            'collect_flood_insurance_data',
            {
              full_name: 'Jane Doe',
              email: 'jane@example.com',
              street_address: '12 Harbor Way',
              city: 'Tampa',
              state: 'FL',
              zip_code: '33601',
            },
            'c2'
          )
        ),
        answer('Ready to submit.'),
        requestTools(toolCall('submit_quote_request', {}, 'c3')),
        requestTools(toolCall('submit_quote_request', {}, 'c4')),
        answer('Submitted.'),
      ]),
      executor: new ToolDispatcher(),
      locks,
      maxToolRounds: 8,
      turnTimeoutMs: 200,
    });

    try {
      await sessions.handleTurn('t-1', 'flood insurance please');
      await expect(sessions.handleTurn('t-1', 'submit it')).rejects.toBeInstanceOf(TurnTimeoutError);

      const retry = sessions.handleTurn('t-1', 'submit it again');
      openGate();
      await expect(retry).resolves.toMatchObject({ response: 'Submitted.' });

      expect(crm.createLead).toHaveBeenCalledTimes(1);
      expect(threads.get('t-1')?.services.intake.state).toBe('Submitted');
    } finally {
      openGate();
      await fs.rm(dataDir, { recursive: true, force: true });
    }
  });

  it('should report unknown threads as not found', () => {
    const { sessions } = setup([]);

    expect(() => sessions.getHistory('missing')).toThrow(NotFoundError);
    expect(() => sessions.getHistory('missing')).toThrow('Thread missing not found');
  });

  it('should delete threads idempotently and count active ones', async () => {
    const { sessions } = setup([answer('a'), answer('b')]);
    await sessions.handleTurn('t-1', 'hi');
    await sessions.handleTurn('t-2', 'hi');

    expect(sessions.stats()).toEqual({ activeThreads: 2 });
    await expect(sessions.deleteThread('t-1')).resolves.toBe(true);
    await expect(sessions.deleteThread('t-1')).resolves.toBe(false);
    expect(sessions.stats()).toEqual({ activeThreads: 1 });
  });

  it('should give each thread its own intake session', async () => {
    const { sessions, threads } = setup([answer('a'), answer('b')]);
    await sessions.handleTurn('t-1', 'hi');
    await sessions.handleTurn('t-2', 'hi');

    const first = threads.get('t-1')?.services.intake;
    const second = threads.get('t-2')?.services.intake;
    expect(first).toBeDefined();
    expect(first).not.toBe(second);
    expect(first?.sessionId).not.toBe(second?.sessionId);
  });
});
