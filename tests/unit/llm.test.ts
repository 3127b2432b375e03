const mockOpenAICreate = jest.fn();
const mockAnthropicCreate = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({ chat: { completions: { create: mockOpenAICreate } } })),
}));

jest.mock('@anthropic-ai/sdk', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({ messages: { create: mockAnthropicCreate } })),
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { OpenAIProvider, toOpenAIMessages, toOpenAITools } from '../../src/services/llm/openai.service';
import { AnthropicProvider, toAnthropicRequest, toAnthropicTools } from '../../src/services/llm/anthropic.service';
import { Message, ToolSchema } from '../../src/types/conversation';
import { ServiceError } from '../../src/utils/errors';

const at = '2030-01-01T00:00:00.000Z';

const history: Message[] = [
  { role: 'system', content: 'You are an intake assistant.', createdAt: at },
  { role: 'user', content: 'Look up P-100', createdAt: at },
  {
    role: 'assistant',
    content: null,
    toolCalls: [
      { id: 'c1', name: 'lookup_policy_by_number', arguments: '{"policy_number":"P-100"}' },
      { id: 'c2', name: 'get_customer_policies', arguments: '{"customer_id":"C-9"}' },
    ],
    createdAt: at,
  },
  { role: 'tool', toolCallId: 'c1', name: 'lookup_policy_by_number', content: 'Found policy P-100.', createdAt: at },
  { role: 'tool', toolCallId: 'c2', name: 'get_customer_policies', content: 'No policies found.', createdAt: at },
  { role: 'assistant', content: 'Your policy is active.', createdAt: at },
];

const schema: ToolSchema = {
  name: 'lookup_policy_by_number',
  description: 'Look up a policy',
  parameters: { type: 'object', properties: { policy_number: { type: 'string' } }, required: ['policy_number'] },
};

function rateLimited() {
  return Object.assign(new Error('Too many requests'), { status: 429 });
}

describe('OpenAI message conversion', () => {
  it('should map every role to the chat completions shape', () => {
    expect(toOpenAIMessages(history)).toEqual([
      { role: 'system', content: 'You are an intake assistant.' },
      { role: 'user', content: 'Look up P-100' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [
          { id: 'c1', type: 'function', function: { name: 'lookup_policy_by_number', arguments: '{"policy_number":"P-100"}' } },
          { id: 'c2', type: 'function', function: { name: 'get_customer_policies', arguments: '{"customer_id":"C-9"}' } },
        ],
      },
      { role: 'tool', tool_call_id: 'c1', content: 'Found policy P-100.' },
      { role: 'tool', tool_call_id: 'c2', content: 'No policies found.' },
      { role: 'assistant', content: 'Your policy is active.' },
    ]);
  });

  it('should wrap tool schemas as functions', () => {
    expect(toOpenAITools([schema])).toEqual([
      {
        type: 'function',
        function: { name: 'lookup_policy_by_number', description: 'Look up a policy', parameters: schema.parameters },
      },
    ]);
  });
});

describe('OpenAIProvider', () => {
  beforeEach(() => {
    mockOpenAICreate.mockReset();
  });

  it('should return text and tool calls from the first choice', async () => {
    mockOpenAICreate.mockResolvedValue({
      choices: [
        {
          message: {
            content: null,
            tool_calls: [{ id: 'c1', type: 'function', function: { name: 'lookup_policy_by_number', arguments: '{}' } }],
          },
        },
      ],
      usage: { prompt_tokens: 10, completion_tokens: 2 },
    });
    const provider = new OpenAIProvider({ apiKey: 'test-key', model: 'gpt-test', temperature: 0.2 });

    const reply = await provider.complete(history, [schema]);

    expect(reply).toEqual({ content: null, toolCalls: [{ id: 'c1', name: 'lookup_policy_by_number', arguments: '{}' }] });
    expect(mockOpenAICreate).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'gpt-test', temperature: 0.2, tools: toOpenAITools([schema]) }),
      { signal: undefined }
    );
  });

  it('should omit tools when none are offered', async () => {
    mockOpenAICreate.mockResolvedValue({ choices: [{ message: { content: 'Hi there' } }] });
    const provider = new OpenAIProvider({ apiKey: 'test-key', model: 'gpt-test', temperature: 0 });

    await expect(provider.complete(history, [])).resolves.toEqual({ content: 'Hi there', toolCalls: [] });
    expect(mockOpenAICreate.mock.calls[0][0].tools).toBeUndefined();
  });

  it('should back off and retry after a rate limit', async () => {
    mockOpenAICreate
      .mockRejectedValueOnce(rateLimited())
      .mockResolvedValueOnce({ choices: [{ message: { content: 'Recovered' } }] });
    const provider = new OpenAIProvider({ apiKey: 'test-key', model: 'gpt-test', temperature: 0, retryDelayMs: 0 });

    await expect(provider.complete(history, [])).resolves.toEqual({ content: 'Recovered', toolCalls: [] });
    expect(mockOpenAICreate).toHaveBeenCalledTimes(2);
  });

  it('should give up on rate limits after the retry budget', async () => {
    mockOpenAICreate.mockRejectedValue(rateLimited());
    const provider = new OpenAIProvider({
      apiKey: 'test-key',
      model: 'gpt-test',
      temperature: 0,
      maxRetries: 2,
      retryDelayMs: 0,
    });

    const error = await provider.complete(history, []).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({ service: 'OpenAI', operation: 'complete', retryable: true });
    expect(mockOpenAICreate).toHaveBeenCalledTimes(2);
  });

  it('should not retry other failures', async () => {
    mockOpenAICreate.mockRejectedValue(Object.assign(new Error('bad request'), { status: 400 }));
    const provider = new OpenAIProvider({ apiKey: 'test-key', model: 'gpt-test', temperature: 0, retryDelayMs: 0 });

    const error = await provider.complete(history, []).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({ message: 'OpenAI.complete failed: bad request', retryable: false });
    expect(mockOpenAICreate).toHaveBeenCalledTimes(1);
  });
});

describe('Anthropic request conversion', () => {
  it('should lift the system prompt and group tool results into one user turn', () => {
    const request = toAnthropicRequest(history);

    expect(request.system).toBe('You are an intake assistant.');
    expect(request.messages).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'Look up P-100' }] },
      {
        role: 'assistant',
        content: [
          { type: 'tool_use', id: 'c1', name: 'lookup_policy_by_number', input: { policy_number: 'P-100' } },
          { type: 'tool_use', id: 'c2', name: 'get_customer_policies', input: { customer_id: 'C-9' } },
        ],
      },
      {
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'c1', content: 'Found policy P-100.' },
          { type: 'tool_result', tool_use_id: 'c2', content: 'No policies found.' },
        ],
      },
      { role: 'assistant', content: [{ type: 'text', text: 'Your policy is active.' }] },
    ]);
  });

  it('should merge a user message that follows tool results', () => {
    const request = toAnthropicRequest([
      ...history.slice(0, 4),
      { role: 'user', content: 'Thanks', createdAt: at },
    ]);

    expect(request.messages[2]).toEqual({
      role: 'user',
      content: [
        { type: 'tool_result', tool_use_id: 'c1', content: 'Found policy P-100.' },
        { type: 'text', text: 'Thanks' },
      ],
    });
  });

  it('should send unparseable tool arguments as an empty input', () => {
    const request = toAnthropicRequest([
      { role: 'assistant', content: null, toolCalls: [{ id: 'c1', name: 'x', arguments: '{oops' }], createdAt: at },
    ]);

    expect(request.messages).toEqual([{ role: 'assistant', content: [{ type: 'tool_use', id: 'c1', name: 'x', input: {} }] }]);
  });

  it('should describe tools with input schemas', () => {
    expect(toAnthropicTools([schema])).toEqual([
      { name: 'lookup_policy_by_number', description: 'Look up a policy', input_schema: schema.parameters },
    ]);
  });
});

describe('AnthropicProvider', () => {
  beforeEach(() => {
    mockAnthropicCreate.mockReset();
  });

  it('should join text blocks and serialise tool inputs', async () => {
    mockAnthropicCreate.mockResolvedValue({
      content: [
        { type: 'text', text: 'Let me check. ' },
        { type: 'tool_use', id: 't1', name: 'lookup_policy_by_number', input: { policy_number: 'P-100' } },
      ],
      usage: { input_tokens: 12, output_tokens: 4 },
    });
    const provider = new AnthropicProvider({ apiKey: 'test-key', model: 'claude-test', temperature: 0 });

    const reply = await provider.complete(history, [schema]);

    expect(reply).toEqual({
      content: 'Let me check.',
      toolCalls: [{ id: 't1', name: 'lookup_policy_by_number', arguments: '{"policy_number":"P-100"}' }],
    });
    expect(mockAnthropicCreate).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'claude-test', system: 'You are an intake assistant.', max_tokens: 1024 }),
      { signal: undefined }
    );
  });

  it('should retry once after a rate limit', async () => {
    mockAnthropicCreate
      .mockRejectedValueOnce(rateLimited())
      .mockResolvedValueOnce({ content: [{ type: 'text', text: 'ok' }] });
    const provider = new AnthropicProvider({ apiKey: 'test-key', model: 'claude-test', temperature: 0, retryDelayMs: 0 });

    await expect(provider.complete(history, [])).resolves.toEqual({ content: 'ok', toolCalls: [] });
    expect(mockAnthropicCreate).toHaveBeenCalledTimes(2);
  });

  it('should wrap failures in a service error', async () => {
    mockAnthropicCreate.mockRejectedValue(new Error('overloaded'));
    const provider = new AnthropicProvider({ apiKey: 'test-key', model: 'claude-test', temperature: 0 });

    await expect(provider.complete(history, [])).rejects.toThrow('Anthropic.complete failed: overloaded');
  });
});
