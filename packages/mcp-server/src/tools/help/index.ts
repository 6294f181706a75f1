export { guideTool } from './guide_tool.js';
export type { GuideInput } from './guide_tool.js';
