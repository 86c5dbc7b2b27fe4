import type { ChatMessage } from '../../core/types/chat-message.type';
import { FALLBACK_ECHO_LENGTH, FALLBACK_PREFIX } from '../constants/chat.constants';

/**
 * Degraded reply used when no completion is available:
 * echoes the start of the most recent user message.
 */
export function localFallbackReply(messages: readonly ChatMessage[]): string {
    let lastUser = '';
    for (let i = messages.length - 1; i >= 0; i--) {
        if (messages[i].role === 'user') {
            lastUser = messages[i].content;
            break;
        }
    }

    // Counted in code points so surrogate pairs are never split
    const echo = Array.from(lastUser).slice(0, FALLBACK_ECHO_LENGTH).join('');
    return `${FALLBACK_PREFIX}${echo}`;
}
