export { PromptManager, parsePromptFile } from './prompt-manager.js';
export type { PromptMeta, PromptTemplate } from './prompt-manager.js';
