import type { ChatMessage } from '../types/chat-message.type';

/** Injection token for the active completion client */
export const COMPLETION_CLIENT = Symbol('COMPLETION_CLIENT');

export type CompletionFailureReason = 'unavailable' | 'error';

export interface CompletionSuccess {
    ok: true;
    text: string;
    model: string;
    tokensUsed?: number;
}

export interface CompletionFailure {
    ok: false;
    reason: CompletionFailureReason;
    message: string;
}

export type CompletionResult = CompletionSuccess | CompletionFailure;

/**
 * Sends an assembled message sequence to a language model.
 *
 * Failures are reported as `{ ok: false }` results rather than thrown,
 * and never as an empty string.
 */
export interface CompletionClient {
    /** False when the client was assembled without credentials */
    readonly available: boolean;
    /** Model identifier requests are sent to, when known */
    readonly model?: string;
    complete(messages: readonly ChatMessage[]): Promise<CompletionResult>;
}
