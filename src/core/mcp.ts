/**
 * MCP server assembly: one McpServer with every project tool registered
 * against a shared tool context.
 */

import { randomUUID } from 'node:crypto';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZodRawShape } from 'zod';
import {
  createTaskTool,
  deleteTaskTool,
  getFieldOptionsTool,
  getTaskDetailTool,
  getTasksTool,
  listWorkspacesTool,
  updateTasksTool,
} from '../shared/tools/project/index.js';
import type { ToolContext, ToolDefinition } from '../shared/tools/types.js';
import type { ProviderRegistry } from '../shared/work-items/registry.js';

export interface BuildServerOptions {
  name: string;
  version: string;
  providers: ProviderRegistry;
}

function registerTool(
  server: McpServer,
  tool: ToolDefinition<ZodRawShape>,
  context: ToolContext,
): void {
  server.registerTool(
    tool.name,
    {
      title: tool.title,
      description: tool.description,
      inputSchema: tool.inputSchema.shape,
      annotations: tool.annotations,
    },
    async (args) => tool.handler(tool.inputSchema.parse(args), context),
  );
}

export function buildServer(options: BuildServerOptions): McpServer {
  const server = new McpServer({ name: options.name, version: options.version });
  const context: ToolContext = { sessionId: randomUUID(), providers: options.providers };

  registerTool(server, listWorkspacesTool, context);
  registerTool(server, createTaskTool, context);
  registerTool(server, getTasksTool, context);
  registerTool(server, getTaskDetailTool, context);
  registerTool(server, updateTasksTool, context);
  registerTool(server, deleteTaskTool, context);
  registerTool(server, getFieldOptionsTool, context);

  return server;
}
