export { createTaskTool } from './create-task.js';
export { deleteTaskTool } from './delete-task.js';
export { getFieldOptionsTool } from './get-field-options.js';
export { getTaskDetailTool } from './get-task-detail.js';
export { getTasksTool } from './get-tasks.js';
export { listWorkspacesTool } from './list-workspaces.js';
export { updateTasksTool } from './update-tasks.js';
