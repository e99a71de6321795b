/**
 * Create Task tool.
 */

import { z } from 'zod';
import { toolsMetadata } from '../../../config/metadata.js';
import { CreateTaskOutputSchema } from '../../../schemas/outputs.js';
import { logger } from '../../../utils/logger.js';
import { DEFAULT_PRIORITY } from '../../work-items/provider.js';
import { defineTool, type ToolContext, type ToolResult } from '../types.js';
import { errorResult } from './shared/results.js';

const InputSchema = z.object({
  name: z.string().trim().min(1),
  project: z.string().optional(),
  work_item_type: z.string().optional(),
  priority: z.string().default(DEFAULT_PRIORITY),
  description: z.string().default(''),
  assignee: z.string().optional(),
});

export const createTaskTool = defineTool({
  name: toolsMetadata.create_task.name,
  title: toolsMetadata.create_task.title,
  description: toolsMetadata.create_task.description,
  inputSchema: InputSchema,
  annotations: {
    readOnlyHint: false,
    destructiveHint: false,
  },

  handler: async (args, context: ToolContext): Promise<ToolResult> => {
    let id: number;
    try {
      const provider = context.providers.forScope({
        project: args.project,
        workItemType: args.work_item_type,
      });
      id = await provider.createIssue({
        name: args.name,
        priority: args.priority,
        description: args.description,
        assignee: args.assignee,
      });
    } catch (error) {
      return errorResult('create_task', 'Creating task', error);
    }

    await logger.info('create_task', { id, hasAssignee: Boolean(args.assignee) });

    const meta = {
      nextSteps: [`Use get_task_detail with issue_id=${id} to verify, or update_tasks to modify.`],
      relatedTools: ['get_task_detail', 'update_tasks'],
    };
    const structured = CreateTaskOutputSchema.parse({ id, name: args.name, meta });

    return {
      content: [{ type: 'text', text: `Created task ${id}: ${args.name}\n\n${meta.nextSteps.join(' ')}` }],
      structuredContent: structured,
    };
  },
});
