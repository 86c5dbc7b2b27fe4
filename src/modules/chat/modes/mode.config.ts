/**
 * Chat Mode Types
 *
 * - chat: general friendly assistant
 * - code: software engineering help
 * - knowledge: factual answers, optionally enriched with a Wikipedia summary
 */
export const CHAT_MODES = ['chat', 'code', 'knowledge'] as const;

export type ChatMode = (typeof CHAT_MODES)[number];

export const DEFAULT_MODE: ChatMode = 'chat';

/**
 * Free-form labels accepted for each mode (compared after trim + lowercase).
 */
export const MODE_SYNONYMS: Record<ChatMode, readonly string[]> = {
    chat: ['chat'],
    code: ['code', 'code helper', 'programming'],
    knowledge: ['knowledge', 'facts', 'knowledge assistant'],
} as const;

export function isChatMode(value: unknown): value is ChatMode {
    return typeof value === 'string' && (CHAT_MODES as readonly string[]).includes(value);
}
