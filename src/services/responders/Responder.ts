import { AIProvider, ChatMessage, ToolInvocation } from '../../types/ai-provider';
import { ConversationTurn, ResponderKind } from '../../types/conversation';
import {
  NotFoundError,
  ProtocolViolation,
  describeError,
  malformedToolArguments,
} from '../../utils/errors';
import { createComponentLogger, type Logger } from '../../utils/logger';
import { ToolTable } from '../tools/defineTool';

export const APOLOGY_MESSAGE =
  'I apologize, but I encountered an error processing your request. Please try again.';

export interface ResponderProfile {
  kind: ResponderKind;
  name: string;
  buildSystemPrompt(): Promise<string>;
  tools: ToolTable;
}

export interface ResponderOptions {
  temperature: number;
}

const parseToolArguments = (call: ToolInvocation): unknown => {
  try {
    return JSON.parse(call.arguments || '{}');
  } catch (error) {
    throw malformedToolArguments(call.name, describeError(error).error);
  }
};

export class Responder {
  private readonly logger: Logger;

  constructor(
    private readonly profile: ResponderProfile,
    private readonly ai: AIProvider,
    private readonly options: ResponderOptions
  ) {
    this.logger = createComponentLogger(`responders.${profile.kind}`);
    this.logger.info({
      name: profile.name,
      tools: [...profile.tools.keys()],
    }, 'Responder initialized');
  }

  get kind(): ResponderKind {
    return this.profile.kind;
  }

  /**
   * Produces the final reply for one user turn. Never throws: any failure is
   * logged and replaced by a fixed apology.
   */
  async respond(message: string, history: readonly ConversationTurn[]): Promise<string> {
    try {
      return await this.generate(message, history);
    } catch (error) {
      this.logger.error({ message, ...describeError(error) }, 'Error processing message');
      return APOLOGY_MESSAGE;
    }
  }

  private async generate(message: string, history: readonly ConversationTurn[]): Promise<string> {
    const messages: ChatMessage[] = [
      { role: 'system', content: await this.profile.buildSystemPrompt() },
      ...history.map((turn) => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: message },
    ];

    const first = await this.ai.complete({
      messages,
      tools: [...this.profile.tools.values()].map((tool) => tool.definition),
      toolChoice: 'auto',
      temperature: this.options.temperature,
    });

    if (first.type === 'text') {
      return first.content;
    }

    const { call } = first;
    this.logger.debug({ tool: call.name, arguments: call.arguments }, 'Tool call requested');
    const result = await this.executeTool(call);

    messages.push(
      { role: 'assistant', content: null, toolCall: call },
      { role: 'tool', toolCallId: call.id, content: JSON.stringify(result) }
    );

    const final = await this.ai.complete({
      messages,
      temperature: this.options.temperature,
    });
    if (final.type !== 'text') {
      throw new ProtocolViolation(
        `Second tool call ${final.call.name} requested in the same turn`,
        'UNEXPECTED_TOOL_CALL'
      );
    }
    return final.content;
  }

  /** Not-found results go back to the model so it can explain them. */
  private async executeTool(call: ToolInvocation): Promise<object> {
    const tool = this.profile.tools.get(call.name);
    if (!tool) {
      throw new ProtocolViolation(`Unknown tool: ${call.name}`, 'UNKNOWN_TOOL');
    }

    const args = parseToolArguments(call);
    try {
      return await tool.invoke(args);
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn({ tool: call.name, error: error.message }, 'Tool reported not found');
        return { error: error.code, message: error.message };
      }
      throw error;
    }
  }
}
