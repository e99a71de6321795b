/**
 * Get Field Options tool.
 */

import { z } from 'zod';
import { toolsMetadata } from '../../../config/metadata.js';
import { FieldOptionsOutputSchema } from '../../../schemas/outputs.js';
import { previewLinesFromItems, summarizeList } from '../../../utils/messages.js';
import { defineTool, type ToolContext, type ToolResult } from '../types.js';
import { errorResult } from './shared/results.js';

const InputSchema = z.object({
  field_name: z.string().trim().min(1),
  project: z.string().optional(),
  work_item_type: z.string().optional(),
});

export const getFieldOptionsTool = defineTool({
  name: toolsMetadata.get_field_options.name,
  title: toolsMetadata.get_field_options.title,
  description: toolsMetadata.get_field_options.description,
  inputSchema: InputSchema,
  annotations: {
    readOnlyHint: true,
    destructiveHint: false,
  },

  handler: async (args, context: ToolContext): Promise<ToolResult> => {
    let options: Record<string, string>;
    try {
      const provider = context.providers.forScope({
        project: args.project,
        workItemType: args.work_item_type,
      });
      options = await provider.listAvailableOptions(args.field_name);
    } catch (error) {
      return errorResult('get_field_options', 'Listing field options', error);
    }

    const items = Object.entries(options).map(([label, value]) => ({ label, value }));
    const structured = FieldOptionsOutputSchema.parse({
      field: args.field_name,
      options: items,
      count: items.length,
    });

    const text =
      items.length === 0
        ? `Field '${args.field_name}' has no options.`
        : summarizeList({
            subject: `Options of '${args.field_name}'`,
            count: items.length,
            previewLines: previewLinesFromItems(items, (o) => o.label, 50),
          });

    return {
      content: [{ type: 'text', text }],
      structuredContent: structured,
    };
  },
});
