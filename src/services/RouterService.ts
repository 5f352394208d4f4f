import { z } from 'zod';
import { RESPONDER_SETTINGS } from '../config/responders';
import { AIProvider, ChatMessage, ToolDefinition } from '../types/ai-provider';
import { ConversationTurn, ResponderKind, RoutingDecision } from '../types/conversation';
import { ProtocolViolation, describeError, malformedToolArguments } from '../utils/errors';
import { createComponentLogger } from '../utils/logger';
import { toToolDefinition } from './tools/defineTool';

const logger = createComponentLogger('router');

export const ROUTING_TOOL_NAME = 'route_to_responder';

const routingDecisionSchema = (first: ResponderKind, rest: ResponderKind[]) =>
  z.object({
    responder: z.enum([first, ...rest]).describe('The responder to route to'),
    confidence: z.number().min(0).max(1).describe('Confidence in routing decision'),
    reasoning: z.string().describe('Brief explanation for routing choice'),
  });

export interface RouterServiceOptions {
  enabled: readonly ResponderKind[];
  temperature: number;
}

export class RouterService {
  private readonly enabled: readonly ResponderKind[];
  private readonly decisionSchema: ReturnType<typeof routingDecisionSchema>;
  private readonly routingTool: ToolDefinition;
  private readonly systemPrompt: string;

  constructor(
    private readonly ai: AIProvider,
    private readonly options: RouterServiceOptions
  ) {
    const [first, ...rest] = options.enabled;
    if (!first) {
      throw new Error('At least one responder must be enabled');
    }
    this.enabled = [first, ...rest];

    this.decisionSchema = routingDecisionSchema(first, rest);
    this.routingTool = toToolDefinition(
      ROUTING_TOOL_NAME,
      'Route the query to a specialized responder',
      this.decisionSchema
    );
    this.systemPrompt = this.createSystemPrompt();
    logger.info({ enabled: this.enabled }, 'Router initialized');
  }

  get enabledResponders(): readonly ResponderKind[] {
    return this.enabled;
  }

  /**
   * Classifies one message. Throws when the model answers in free text or
   * with arguments that do not fit the routing schema.
   */
  async route(message: string, history: readonly ConversationTurn[]): Promise<RoutingDecision> {
    const messages: ChatMessage[] = [
      { role: 'system', content: this.systemPrompt },
      ...history.map((turn) => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: message },
    ];

    const result = await this.ai.complete({
      messages,
      tools: [this.routingTool],
      toolChoice: 'required',
      temperature: this.options.temperature,
    });

    if (result.type !== 'tool_call') {
      throw new ProtocolViolation('Router answered without a routing decision', 'MISSING_TOOL_CALL');
    }
    if (result.call.name !== ROUTING_TOOL_NAME) {
      throw new ProtocolViolation(`Router called unknown tool: ${result.call.name}`, 'UNKNOWN_TOOL');
    }

    let args: unknown;
    try {
      args = JSON.parse(result.call.arguments);
    } catch (error) {
      throw malformedToolArguments(ROUTING_TOOL_NAME, describeError(error).error);
    }
    const parsed = this.decisionSchema.safeParse(args);
    if (!parsed.success) {
      throw malformedToolArguments(
        ROUTING_TOOL_NAME,
        parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
      );
    }

    const decision: RoutingDecision = {
      responder: parsed.data.responder,
      confidence: parsed.data.confidence,
      rationale: parsed.data.reasoning,
    };
    logger.info({ ...decision }, 'Routing decision');
    return decision;
  }

  private createSystemPrompt(): string {
    const responders = this.enabled
      .map((kind, index) => {
        const settings = RESPONDER_SETTINGS[kind];
        return `${index + 1}. ${settings.displayName} (id: ${kind})
${settings.responsibilities.map((item) => `   - ${item}`).join('\n')}
   KEYWORDS: ${settings.keywords.join(', ')}`;
      })
      .join('\n\n');

    return `You are a router that directs customer queries to specialized responders.

AVAILABLE RESPONDERS:
${responders}

ROUTING RULES:
1. Order process priority:
   - ANY purchase intent or order detail goes to the Orders responder
   - STAY with the Orders responder until the purchase is complete
2. Context awareness:
   - Check the conversation history for an active order
   - Keep responder continuity when appropriate
3. Defaults:
   - Product comparisons go to Product Details first
   - Review requests go straight to Reviews

Only respond by calling ${ROUTING_TOOL_NAME} with the responder id, your confidence (0-1) and a brief reasoning.`;
  }
}
