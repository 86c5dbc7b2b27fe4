import type { CompletionClient } from '../../core/completion/completion-client.interface';
import type { EnrichmentClient } from '../../knowledge/enrichment/enrichment-client.interface';
import type { ChatMode } from '../modes/mode.config';

/**
 * Construction-time settings for one engine. Read from configuration by
 * the caller; the engine itself never touches the environment.
 */
export interface ChatEngineOptions {
    /** Maximum retained messages, also the cap on assembled messages */
    historyCapacity: number;
    /** Attach an external summary to knowledge-mode turns */
    enrichKnowledgeMode: boolean;
    /** Sentences requested from the enrichment source */
    enrichmentSentences: number;
    /** Initial prompts; omitted modes use the chat-mode default */
    systemPrompts?: Partial<Record<ChatMode, string>>;
}

export interface ChatEngineCollaborators {
    completion: CompletionClient;
    enrichment: EnrichmentClient;
}

/** Outcome of one `runTurn` call */
export interface TurnResult {
    reply: string;
    mode: ChatMode;
    /** True when the reply came from the local fallback */
    usedFallback: boolean;
    /** True when external context was attached to the request */
    enriched: boolean;
    model?: string;
    tokensUsed?: number;
}
