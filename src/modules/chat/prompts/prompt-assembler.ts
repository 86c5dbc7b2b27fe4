import { getKnowledgeContextPrompt } from '../../core/prompts';
import { createMessage, type ChatMessage } from '../../core/types/chat-message.type';

export interface AssembleMessagesInput {
    systemPrompt: string;
    /** Formatted source block for this turn only */
    enrichment?: string;
    history: readonly ChatMessage[];
    /** Upper bound on the total number of assembled messages */
    capacity: number;
}

/**
 * Builds the exact message sequence sent to the model:
 * mode prompt, optional context block, then the newest history that fits.
 */
export function assembleMessages({ systemPrompt, enrichment, history, capacity }: AssembleMessagesInput): ChatMessage[] {
    const messages: ChatMessage[] = [createMessage('system', systemPrompt)];

    if (enrichment) {
        messages.push(createMessage('system', getKnowledgeContextPrompt(enrichment)));
    }

    // Clamped at zero: a tiny capacity yields only the system messages
    const room = Math.max(0, capacity - messages.length);
    if (room > 0) {
        messages.push(...history.slice(-room));
    }

    return messages;
}
