export { notesGetTool } from './notes_get_tool.js';
export { notesSetTool } from './notes_set_tool.js';
export { notesDeleteTool } from './notes_delete_tool.js';
export type * from './notes_tools.types.js';
