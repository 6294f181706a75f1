export { taskAddTool } from './task_add_tool.js';
export { taskCompleteTool } from './task_complete_tool.js';
export { taskUncompleteTool } from './task_uncomplete_tool.js';
export { taskRemoveTool } from './task_remove_tool.js';
export { taskChangeLevelTool } from './task_change_level_tool.js';
export type * from './task_tools.types.js';
