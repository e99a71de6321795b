/**
 * Delete Task tool.
 */

import { z } from 'zod';
import { toolsMetadata } from '../../../config/metadata.js';
import { DeleteTaskOutputSchema } from '../../../schemas/outputs.js';
import { defineTool, type ToolContext, type ToolResult } from '../types.js';
import { errorResult } from './shared/results.js';

const InputSchema = z.object({
  issue_id: z.number().int().positive(),
  project: z.string().optional(),
  work_item_type: z.string().optional(),
});

export const deleteTaskTool = defineTool({
  name: toolsMetadata.delete_task.name,
  title: toolsMetadata.delete_task.title,
  description: toolsMetadata.delete_task.description,
  inputSchema: InputSchema,
  annotations: {
    readOnlyHint: false,
    destructiveHint: true,
  },

  handler: async (args, context: ToolContext): Promise<ToolResult> => {
    try {
      const provider = context.providers.forScope({
        project: args.project,
        workItemType: args.work_item_type,
      });
      await provider.deleteIssue(args.issue_id);
    } catch (error) {
      return errorResult('delete_task', 'Deleting task', error);
    }

    return {
      content: [{ type: 'text', text: `Deleted task ${args.issue_id}.` }],
      structuredContent: DeleteTaskOutputSchema.parse({ id: args.issue_id, deleted: true }),
    };
  },
});
