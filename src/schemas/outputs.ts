/**
 * Shapes of the structuredContent returned by each tool.
 */

import { z } from 'zod';

const MetaSchema = z.object({
  nextSteps: z.array(z.string()).optional(),
  relatedTools: z.array(z.string()).optional(),
});

export const ListWorkspacesOutputSchema = z.object({
  items: z.array(z.object({ name: z.string(), key: z.string() })),
  count: z.number().int(),
  meta: MetaSchema,
});
export type ListWorkspacesOutput = z.infer<typeof ListWorkspacesOutputSchema>;

export const CreateTaskOutputSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  meta: MetaSchema,
});

export const WorkItemSummarySchema = z.object({
  id: z.number().int(),
  name: z.string().nullable(),
  status: z.string().nullable(),
  priority: z.string().nullable(),
  owner: z.string().nullable(),
});

export const GetTasksOutputSchema = z.object({
  items: z.array(WorkItemSummarySchema),
  total: z.number().int(),
  pageNum: z.number().int(),
  pageSize: z.number().int(),
  hint: z.string().optional(),
  meta: MetaSchema,
});
export type GetTasksOutput = z.infer<typeof GetTasksOutputSchema>;

export const TaskDetailOutputSchema = z.object({
  id: z.number().int(),
  name: z.string().nullable(),
  readableFields: z.record(z.unknown()),
  item: z.record(z.unknown()),
});

export const UpdateResultSchema = z.object({
  success: z.boolean(),
  itemId: z.number().int(),
  fieldName: z.string(),
  message: z.string(),
  value: z.unknown().optional(),
});

export const UpdateTasksOutputSchema = z.object({
  results: z.array(UpdateResultSchema),
  summary: z.object({
    total: z.number().int(),
    succeeded: z.number().int(),
    failed: z.number().int(),
  }),
  meta: MetaSchema,
});
export type UpdateTasksOutput = z.infer<typeof UpdateTasksOutputSchema>;

export const DeleteTaskOutputSchema = z.object({
  id: z.number().int(),
  deleted: z.literal(true),
});

export const FieldOptionsOutputSchema = z.object({
  field: z.string(),
  options: z.array(z.object({ label: z.string(), value: z.string() })),
  count: z.number().int(),
});

export const ToolErrorOutputSchema = z.object({
  error: z.string(),
  code: z.string(),
  message: z.string(),
  hint: z.string().optional(),
  suggestion: z.string().optional(),
});
export type ToolErrorOutput = z.infer<typeof ToolErrorOutputSchema>;
