// System Prompts Module - Central export point for all AI system prompts.

export { DEFAULT_SYSTEM_PROMPTS } from './mode-system.prompt';
export { formatSourceBlock, getKnowledgeContextPrompt, type KnowledgeSource } from './knowledge-context.prompt';
