/**
 * Names, titles and descriptions of the MCP tools.
 */

export interface ToolMetadata {
  name: string;
  title: string;
  description: string;
}

export const toolsMetadata = {
  list_workspaces: {
    name: 'list_workspaces',
    title: 'List Workspaces',
    description:
      'List the workspaces the configured user can see, as name and key pairs. ' +
      'Call this first when you do not know which workspace to use. ' +
      'Every other tool accepts either the workspace name or its key (keys start with "project_") as "project".',
  },
  create_task: {
    name: 'create_task',
    title: 'Create Task',
    description:
      'Create a work item and return its id. ' +
      'Inputs: name (required), priority (option label such as "P1", default "P2"), description, ' +
      'assignee (user name, email or user key), project (workspace name or key) and work_item_type (type name). ' +
      'Labels are matched to option values for you.',
  },
  get_tasks: {
    name: 'get_tasks',
    title: 'Get Tasks',
    description:
      'List work items with optional filters: name_keyword, status and priority (comma-separated labels), ' +
      'owner (name or email) and related_to (item id or item name). ' +
      'Paginate with page_num and page_size (max 100). ' +
      'related_to on its own scans a bounded number of items; combine it with other filters for wider coverage.',
  },
  get_task_detail: {
    name: 'get_task_detail',
    title: 'Get Task Detail',
    description:
      'Get one work item by id with readable field values: field names instead of keys, user names, ' +
      'option labels and related item names. The item is looked up across every item type of the workspace.',
  },
  update_tasks: {
    name: 'update_tasks',
    title: 'Update Tasks',
    description:
      'Update one or more work items by id. Inputs: name, description, priority, status, assignee, and fields ' +
      '(field name -> value) for anything else. Option labels, user names and multi-select lists ' +
      '(comma, semicolon or " / " separated) are resolved for you. ' +
      'Returns one result per item and field; writes are rate limited and retried on throttling.',
  },
  delete_task: {
    name: 'delete_task',
    title: 'Delete Task',
    description: 'Delete a work item by id. This cannot be undone.',
  },
  get_field_options: {
    name: 'get_field_options',
    title: 'Get Field Options',
    description:
      'List the option labels and values of a select field (for example "priority" or "status"). ' +
      'Use the labels as input to create_task, update_tasks or get_tasks.',
  },
} as const satisfies Record<string, ToolMetadata>;

export type ToolName = keyof typeof toolsMetadata;
