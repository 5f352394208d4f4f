import Together from 'together-ai';
import { CompletionCreateParamsNonStreaming } from 'together-ai/resources/chat/completions';
import {
  AIProvider,
  ChatMessage,
  CompletionRequest,
  CompletionResult,
} from '../../types/ai-provider';
import { ExternalCallFailure, describeError } from '../../utils/errors';
import { createComponentLogger } from '../../utils/logger';

const logger = createComponentLogger('providers.together');

type TogetherMessage = CompletionCreateParamsNonStreaming['messages'][number];

export interface TogetherAIProviderOptions {
  apiKey: string;
  model: string;
}

export class TogetherAIProvider implements AIProvider {
  private together: Together;
  public readonly model: string;

  constructor(options: TogetherAIProviderOptions) {
    if (!options.apiKey) {
      throw new Error('TOGETHER_API_KEY is required');
    }
    this.together = new Together({ apiKey: options.apiKey });
    this.model = options.model;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const data: CompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: request.messages.map((message) => this.toTogetherMessage(message)),
      temperature: request.temperature,
    };
    if (request.tools && request.tools.length > 0) {
      data.tools = request.tools.map((tool) => ({
        type: 'function',
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
        },
      }));
      data.tool_choice = request.toolChoice ?? 'auto';
    }

    logger.debug({
      model: this.model,
      messages: request.messages.length,
      tools: request.tools?.map((tool) => tool.name),
    }, 'Sending completion request to Together AI');

    let response;
    try {
      response = await this.together.chat.completions.create(data);
    } catch (error) {
      logger.error(describeError(error), 'Together AI request failed');
      throw new ExternalCallFailure('Together AI request failed', { cause: error });
    }

    const message = response?.choices?.[0]?.message;
    const toolCall = message?.tool_calls?.[0];
    if (toolCall) {
      return {
        type: 'tool_call',
        call: {
          id: toolCall.id,
          name: toolCall.function.name,
          arguments: toolCall.function.arguments,
        },
      };
    }

    if (message?.content) {
      return { type: 'text', content: message.content };
    }

    throw new ExternalCallFailure('No response from Together AI service');
  }

  private toTogetherMessage(message: ChatMessage): TogetherMessage {
    if (message.role === 'tool') {
      return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
    }
    if ('toolCall' in message) {
      return {
        role: 'assistant',
        content: '',
        tool_calls: [
          {
            id: message.toolCall.id,
            type: 'function',
            index: 0,
            function: {
              name: message.toolCall.name,
              arguments: message.toolCall.arguments,
            },
          },
        ],
      };
    }
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'assistant':
        return { role: 'assistant', content: message.content };
    }
  }
}
