/**
 * List Workspaces tool.
 */

import { z } from 'zod';
import { toolsMetadata } from '../../../config/metadata.js';
import { ListWorkspacesOutputSchema } from '../../../schemas/outputs.js';
import { previewLinesFromItems, summarizeList } from '../../../utils/messages.js';
import { defineTool, type ToolContext, type ToolResult } from '../types.js';
import { errorResult } from './shared/results.js';

const InputSchema = z.object({});

export const listWorkspacesTool = defineTool({
  name: toolsMetadata.list_workspaces.name,
  title: toolsMetadata.list_workspaces.title,
  description: toolsMetadata.list_workspaces.description,
  inputSchema: InputSchema,
  annotations: {
    readOnlyHint: true,
    destructiveHint: false,
  },

  handler: async (_args, context: ToolContext): Promise<ToolResult> => {
    let workspaces: Map<string, string>;
    try {
      workspaces = await context.providers.meta.listWorkspaces();
    } catch (error) {
      return errorResult('list_workspaces', 'Listing workspaces', error);
    }

    const items = [...workspaces.entries()].map(([name, key]) => ({ name, key }));
    const meta = {
      nextSteps: ['Pass a workspace name or key as "project" to the other tools.'],
      relatedTools: ['get_tasks', 'create_task'],
    };

    const structured = ListWorkspacesOutputSchema.parse({ items, count: items.length, meta });
    const text = summarizeList({
      subject: 'Workspaces',
      count: items.length,
      previewLines: previewLinesFromItems(items, (w) => `${w.name} -> ${w.key}`, 20),
      nextSteps: meta.nextSteps,
    });

    return {
      content: [{ type: 'text', text }],
      structuredContent: structured,
    };
  },
});
