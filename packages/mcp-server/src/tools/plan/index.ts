export { planCreateTool } from './plan_create_tool.js';
export { planGetTool } from './plan_get_tool.js';
export { planListTool } from './plan_list_tool.js';
export { planDeleteTool } from './plan_delete_tool.js';
export type * from './plan_tools.types.js';
