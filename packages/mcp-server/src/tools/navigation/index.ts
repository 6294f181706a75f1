export { moveToTool } from './move_to_tool.js';
export { getCurrentTool } from './get_current_tool.js';
export { distilledContextTool } from './distilled_context_tool.js';
export type * from './navigation_tools.types.js';
