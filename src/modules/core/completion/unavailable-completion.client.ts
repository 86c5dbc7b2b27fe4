import type { ChatMessage } from '../types/chat-message.type';
import type { CompletionClient, CompletionResult } from './completion-client.interface';

/**
 * Stand-in used when no provider credentials are configured.
 * Every request resolves to an `unavailable` failure.
 */
export class UnavailableCompletionClient implements CompletionClient {
    readonly available = false;

    constructor(private readonly reason: string) { }

    async complete(_messages: readonly ChatMessage[]): Promise<CompletionResult> {
        return { ok: false, reason: 'unavailable', message: this.reason };
    }
}
