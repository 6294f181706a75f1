export { nextStepPrompt, getAllPrompts, renderFocus } from './mcp_prompts.js';
