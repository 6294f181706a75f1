export { leaseGenerateTool } from './lease_generate_tool.js';
export type { LeaseGenerateInput } from './lease_generate_tool.js';
