/**
 * Get Task Detail tool.
 */

import { z } from 'zod';
import { toolsMetadata } from '../../../config/metadata.js';
import { TaskDetailOutputSchema } from '../../../schemas/outputs.js';
import type { ReadableWorkItem } from '../../work-items/readable.js';
import { defineTool, type ToolContext, type ToolResult } from '../types.js';
import { errorResult } from './shared/results.js';

const InputSchema = z.object({
  issue_id: z.number().int().positive(),
  project: z.string().optional(),
  work_item_type: z.string().optional(),
});

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && value.every((v) => typeof v === 'string' || typeof v === 'number')) {
    return value.join(', ');
  }
  return JSON.stringify(value);
}

export const getTaskDetailTool = defineTool({
  name: toolsMetadata.get_task_detail.name,
  title: toolsMetadata.get_task_detail.title,
  description: toolsMetadata.get_task_detail.description,
  inputSchema: InputSchema,
  annotations: {
    readOnlyHint: true,
    destructiveHint: false,
  },

  handler: async (args, context: ToolContext): Promise<ToolResult> => {
    let detail: ReadableWorkItem;
    try {
      const provider = context.providers.forScope({
        project: args.project,
        workItemType: args.work_item_type,
      });
      detail = await provider.getReadableIssueDetails(args.issue_id);
    } catch (error) {
      return errorResult('get_task_detail', 'Fetching task detail', error);
    }

    const structured = TaskDetailOutputSchema.parse({
      id: detail.id,
      name: detail.name ?? null,
      readableFields: detail.readable_fields,
      item: { ...detail },
    });

    const lines = [`Task ${detail.id}: ${detail.name ?? '(untitled)'}`];
    for (const [name, value] of Object.entries(detail.readable_fields)) {
      const text = formatValue(value);
      if (text !== '') {
        lines.push(`- ${name}: ${text}`);
      }
    }

    return {
      content: [{ type: 'text', text: lines.join('\n') }],
      structuredContent: structured,
    };
  },
});
