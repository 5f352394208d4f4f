import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ToolDefinition } from '../../types/ai-provider';
import { malformedToolArguments } from '../../utils/errors';

export interface RegisteredTool {
  definition: ToolDefinition;
  invoke(args: unknown): Promise<object>;
}

/** Tool name → declared schema and handler, built once per responder. */
export type ToolTable = ReadonlyMap<string, RegisteredTool>;

export const toToolDefinition = (
  name: string,
  description: string,
  schema: z.ZodTypeAny
): ToolDefinition => ({
  name,
  description,
  parameters: zodToJsonSchema(schema, { $refStrategy: 'none', target: 'openApi3' }),
});

export const defineTool = <TSchema extends z.ZodTypeAny>(
  name: string,
  description: string,
  schema: TSchema,
  handler: (args: z.output<TSchema>) => Promise<object>
): RegisteredTool => ({
  definition: toToolDefinition(name, description, schema),
  async invoke(args: unknown): Promise<object> {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      const detail = parsed.error.errors
        .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
        .join(', ');
      throw malformedToolArguments(name, detail);
    }
    return handler(parsed.data);
  },
});

export const toolTable = (...tools: RegisteredTool[]): ToolTable =>
  new Map(tools.map((tool) => [tool.definition.name, tool]));
