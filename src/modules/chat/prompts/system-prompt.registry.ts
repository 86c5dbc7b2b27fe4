import { DEFAULT_SYSTEM_PROMPTS } from '../../core/prompts';
import { CHAT_MODES, type ChatMode } from '../modes/mode.config';

/**
 * Per-engine mapping from mode to system prompt.
 * Modes without an entry fall back to the chat-mode default.
 */
export class SystemPromptRegistry {
    private readonly prompts = new Map<ChatMode, string>();

    constructor(initial: Partial<Record<ChatMode, string>> = DEFAULT_SYSTEM_PROMPTS) {
        for (const mode of CHAT_MODES) {
            const prompt = initial[mode];
            if (prompt !== undefined) {
                this.prompts.set(mode, prompt);
            }
        }
    }

    get(mode: ChatMode): string {
        return this.prompts.get(mode) ?? DEFAULT_SYSTEM_PROMPTS.chat;
    }

    // Upserts without validation; an existing prompt is overwritten
    set(mode: ChatMode, prompt: string): void {
        this.prompts.set(mode, prompt);
    }

    entries(): Record<ChatMode, string> {
        return {
            chat: this.get('chat'),
            code: this.get('code'),
            knowledge: this.get('knowledge'),
        };
    }
}
