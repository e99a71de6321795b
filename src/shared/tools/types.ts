import type { CallToolResult, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import type { z, ZodObject, ZodRawShape } from 'zod';
import type { ProviderRegistry } from '../work-items/registry.js';

/** What a tool handler receives besides its arguments. */
export interface ToolContext {
  sessionId: string;
  providers: ProviderRegistry;
}

export type ToolResult = CallToolResult;

export interface ToolDefinition<TShape extends ZodRawShape = ZodRawShape> {
  name: string;
  title?: string;
  description: string;
  inputSchema: ZodObject<TShape>;
  annotations?: ToolAnnotations;
  handler(args: z.infer<ZodObject<TShape>>, context: ToolContext): Promise<ToolResult>;
}

export function defineTool<TShape extends ZodRawShape>(definition: ToolDefinition<TShape>): ToolDefinition<TShape> {
  return definition;
}
