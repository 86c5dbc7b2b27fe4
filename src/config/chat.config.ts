import { registerAs } from '@nestjs/config';
import type { ChatMode } from '../modules/chat/modes/mode.config';
import {
  DEFAULT_ENRICHMENT_SENTENCES,
  DEFAULT_HISTORY_CAPACITY,
  DEFAULT_MAX_SESSIONS,
} from '../modules/chat/constants/chat.constants';

export interface ChatConfig {
  historyCapacity: number;
  maxSessions: number;
  enrichKnowledgeMode: boolean;
  enrichmentSentences: number;
  /** Prompt overrides; unset modes keep their built-in default */
  systemPrompts: Partial<Record<ChatMode, string>>;
}

function promptOverrides(): Partial<Record<ChatMode, string>> {
  const overrides: Partial<Record<ChatMode, string>> = {};
  if (process.env.SYSTEM_PROMPT_CHAT) overrides.chat = process.env.SYSTEM_PROMPT_CHAT;
  if (process.env.SYSTEM_PROMPT_CODE) overrides.code = process.env.SYSTEM_PROMPT_CODE;
  if (process.env.SYSTEM_PROMPT_KNOWLEDGE) overrides.knowledge = process.env.SYSTEM_PROMPT_KNOWLEDGE;
  return overrides;
}

// Accepts every spelling the env validator lets through ('true'/'false'/'1'/'0')
function isEnabled(value: string | undefined): boolean {
  return value === undefined || !['false', '0'].includes(value.trim().toLowerCase());
}

export default registerAs('chat', (): ChatConfig => ({
  /**
   * Messages kept per session; oldest are dropped first.
   * Also caps the number of messages sent to the model per turn.
   */
  historyCapacity: parseInt(process.env.CHAT_HISTORY_SIZE || String(DEFAULT_HISTORY_CAPACITY), 10),

  /**
   * In-memory sessions kept before the oldest is evicted.
   */
  maxSessions: parseInt(process.env.CHAT_MAX_SESSIONS || String(DEFAULT_MAX_SESSIONS), 10),

  enrichKnowledgeMode: isEnabled(process.env.KNOWLEDGE_WIKI_ENABLED),

  enrichmentSentences: parseInt(
    process.env.KNOWLEDGE_SUMMARY_SENTENCES || String(DEFAULT_ENRICHMENT_SENTENCES),
    10,
  ),

  systemPrompts: promptOverrides(),
}));
