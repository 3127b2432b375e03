export interface ToolCall {
  id: string;
  name: string;
  /** Raw JSON argument text exactly as the model issued it. */
  arguments: string;
}

export interface SystemMessage {
  role: 'system';
  content: string;
  createdAt: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
  createdAt: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string | null;
  toolCalls?: ToolCall[];
  createdAt: string;
}

export interface ToolMessage {
  role: 'tool';
  toolCallId: string;
  name: string;
  content: string;
  createdAt: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type MessageRole = Message['role'];

export interface ToolSchema {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

export interface ModelResponse {
  content: string | null;
  toolCalls: ToolCall[];
}

export interface CompletionOptions {
  signal?: AbortSignal;
}

export interface ModelProvider {
  readonly name: string;
  complete(history: Message[], tools: ToolSchema[], options?: CompletionOptions): Promise<ModelResponse>;
}

export interface TurnResult {
  threadId: string;
  response: string;
  timestamp: string;
}
