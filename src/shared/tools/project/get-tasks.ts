/**
 * Get Tasks tool.
 *
 * Filters are passed by label; the provider turns them into option values
 * and user keys. Results are reduced to compact summaries.
 */

import { z } from 'zod';
import { toolsMetadata } from '../../../config/metadata.js';
import { GetTasksOutputSchema } from '../../../schemas/outputs.js';
import { previewLinesFromItems, summarizeList } from '../../../utils/messages.js';
import { DEFAULT_PAGE_SIZE } from '../../work-items/provider.js';
import { defineTool, type ToolContext, type ToolResult } from '../types.js';
import { errorResult, splitCommaList } from './shared/results.js';

export const MAX_PAGE_SIZE = 100;

const InputSchema = z.object({
  project: z.string().optional(),
  work_item_type: z.string().optional(),
  name_keyword: z.string().optional(),
  status: z.string().optional().describe('Comma-separated status labels'),
  priority: z.string().optional().describe('Comma-separated priority labels'),
  owner: z.string().optional(),
  related_to: z.union([z.number().int(), z.string()]).optional(),
  page_num: z.number().int().min(1).default(1),
  page_size: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_PAGE_SIZE)
    .transform((size) => Math.min(size, MAX_PAGE_SIZE)),
});

export const getTasksTool = defineTool({
  name: toolsMetadata.get_tasks.name,
  title: toolsMetadata.get_tasks.title,
  description: toolsMetadata.get_tasks.description,
  inputSchema: InputSchema,
  annotations: {
    readOnlyHint: true,
    destructiveHint: false,
  },

  handler: async (args, context: ToolContext): Promise<ToolResult> => {
    try {
      const provider = context.providers.forScope({
        project: args.project,
        workItemType: args.work_item_type,
      });

      const relatedTo =
        args.related_to === undefined || args.related_to === ''
          ? undefined
          : await provider.resolveRelatedTo(args.related_to);

      const page = await provider.getTasks({
        nameKeyword: args.name_keyword?.trim() || undefined,
        status: splitCommaList(args.status),
        priority: splitCommaList(args.priority),
        owner: args.owner?.trim() || undefined,
        relatedTo,
        pageNum: args.page_num,
        pageSize: args.page_size,
      });
      const items = await provider.simplifyWorkItems(page.items);

      const hasMore = page.pageNum * page.pageSize < page.total;
      const meta = {
        nextSteps: [
          ...(hasMore ? [`Call again with page_num=${page.pageNum + 1} for more.`] : []),
          'Use get_task_detail with an id for all fields.',
        ],
        relatedTools: ['get_task_detail', 'update_tasks'],
      };

      const structured = GetTasksOutputSchema.parse({
        items,
        total: page.total,
        pageNum: page.pageNum,
        pageSize: page.pageSize,
        hint: page.hint,
        meta,
      });

      const preview = previewLinesFromItems(items, (item) => {
        const details = [item.status, item.priority, item.owner].filter((v): v is string => v !== null);
        return `${item.id} ${item.name ?? '(untitled)'}${details.length > 0 ? ` [${details.join(', ')}]` : ''}`;
      });
      let text = summarizeList({
        subject: 'Tasks',
        count: items.length,
        total: page.total,
        pageNum: page.pageNum,
        previewLines: preview,
        nextSteps: meta.nextSteps,
      });
      if (page.hint) {
        text += `\n\n${page.hint}`;
      }

      return {
        content: [{ type: 'text', text }],
        structuredContent: structured,
      };
    } catch (error) {
      return errorResult('get_tasks', 'Listing tasks', error);
    }
  },
});
