export interface ToolInvocation {
  id: string;
  name: string;
  /** Raw JSON text exactly as the model produced it. */
  arguments: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export type ChatMessage =
  | { role: 'system' | 'user' | 'assistant'; content: string }
  | { role: 'assistant'; content: null; toolCall: ToolInvocation }
  | { role: 'tool'; toolCallId: string; content: string };

export interface CompletionRequest {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  /** 'required' forces the model to answer with one of `tools`. */
  toolChoice?: 'auto' | 'required';
  temperature: number;
}

export type CompletionResult =
  | { type: 'text'; content: string }
  | { type: 'tool_call'; call: ToolInvocation };

export interface AIProvider {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
