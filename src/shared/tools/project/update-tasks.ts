/**
 * Update Tasks tool.
 *
 * One call updates the same fields on one or many items. Each (item, field)
 * pair gets its own result; a batch where no field resolves is rejected.
 */

import { z } from 'zod';
import { toolsMetadata } from '../../../config/metadata.js';
import { UpdateTasksOutputSchema } from '../../../schemas/outputs.js';
import { summarizeBatch } from '../../../utils/messages.js';
import type { UpdateResult } from '../../work-items/update-orchestrator.js';
import { defineTool, type ToolContext, type ToolResult } from '../types.js';
import { errorResult } from './shared/results.js';

export const MAX_BATCH_ITEMS = 50;

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const InputSchema = z.object({
  issue_ids: z.array(z.number().int().positive()).min(1).max(MAX_BATCH_ITEMS),
  project: z.string().optional(),
  work_item_type: z.string().optional(),
  name: z.string().optional(),
  description: z.string().optional(),
  priority: z.string().optional(),
  status: z.string().optional(),
  assignee: z.string().optional(),
  fields: z
    .record(z.union([ScalarSchema, z.array(ScalarSchema)]))
    .optional()
    .describe('Other fields by name, e.g. {"Tags": "a, b"}'),
});

export const updateTasksTool = defineTool({
  name: toolsMetadata.update_tasks.name,
  title: toolsMetadata.update_tasks.title,
  description: toolsMetadata.update_tasks.description,
  inputSchema: InputSchema,
  annotations: {
    readOnlyHint: false,
    destructiveHint: false,
  },

  handler: async (args, context: ToolContext): Promise<ToolResult> => {
    const ids = [...new Set(args.issue_ids)];
    let results: UpdateResult[];
    try {
      const provider = context.providers.forScope({
        project: args.project,
        workItemType: args.work_item_type,
      });
      results = await provider.batchUpdateIssues(ids, {
        name: args.name,
        description: args.description,
        priority: args.priority,
        status: args.status,
        assignee: args.assignee,
        extraFields: args.fields,
      });
    } catch (error) {
      return errorResult('update_tasks', 'Updating tasks', error);
    }

    const succeeded = results.filter((r) => r.success).length;
    const failed = results.length - succeeded;
    const meta = {
      nextSteps: [
        ...(failed > 0 ? ['Use get_field_options to check valid labels for failed fields.'] : []),
        'Use get_task_detail to verify the new values.',
      ],
      relatedTools: ['get_task_detail', 'get_field_options'],
    };

    const structured = UpdateTasksOutputSchema.parse({
      results,
      summary: { total: results.length, succeeded, failed },
      meta,
    });

    const text = summarizeBatch({
      action: 'Updated fields',
      ok: succeeded,
      total: results.length,
      failures: results
        .filter((r) => !r.success)
        .map((r) => ({ id: `${r.itemId} ${r.fieldName}`, error: r.message })),
    });

    return {
      isError: succeeded === 0 && results.length > 0 ? true : undefined,
      content: [{ type: 'text', text: `${text}\n\nNext: ${meta.nextSteps.join(' ')}` }],
      structuredContent: structured,
    };
  },
});
