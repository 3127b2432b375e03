import { ToolRegistry, toolRegistry } from './tool.registry';
import type { ThreadServices } from '../thread.store';
import { ToolCall, ToolSchema } from '../../types/conversation';
import { ToolOutcome, failure } from '../../types/tools';
import { UnknownToolError, ValidationError, errorMessage, toError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export interface ToolExecutor {
  schemas(): ToolSchema[];
  execute(call: ToolCall, services: ThreadServices): Promise<ToolOutcome>;
}

/**
 * Runs one tool call against a thread's services. Whatever happens, the caller gets a
 * ToolOutcome back: bad JSON, unknown names, invalid arguments and handler exceptions
 * all become failure text the model can read.
 */
export class ToolDispatcher implements ToolExecutor {
  constructor(private readonly registry: ToolRegistry = toolRegistry) {}

  schemas(): ToolSchema[] {
    return this.registry.schemas();
  }

  async execute(call: ToolCall, services: ThreadServices): Promise<ToolOutcome> {
    const tool = this.registry.get(call.name);
    if (!tool) {
      logger.warn('Model requested unknown tool', { tool: call.name, callId: call.id });
      return failure(new UnknownToolError(call.name), `Unknown function: ${call.name}`);
    }

    let input: unknown;
    try {
      input = call.arguments.trim() === '' ? {} : JSON.parse(call.arguments);
    } catch (error) {
      logger.warn('Tool arguments are not valid JSON', { tool: call.name, error: errorMessage(error) });
      return failure(
        new ValidationError(`Arguments for ${call.name} are not valid JSON`),
        `Error executing ${call.name}: arguments are not valid JSON`
      );
    }

    try {
      const outcome = await tool.invoke(input, services);
      logger.info('Tool executed', { tool: call.name, callId: call.id, ok: outcome.ok });
      return outcome;
    } catch (error) {
      logger.error('Tool execution failed', { tool: call.name, callId: call.id, error: errorMessage(error) });
      return failure(toError(error), `Error executing ${call.name}: ${errorMessage(error)}`);
    }
  }
}
