import { Logger } from '@nestjs/common';
import type { CompletionResult } from '../../core/completion/completion-client.interface';
import { DEFAULT_SYSTEM_PROMPTS, formatSourceBlock } from '../../core/prompts';
import { createMessage, type ChatMessage } from '../../core/types/chat-message.type';
import type { EnrichmentResult } from '../../knowledge/enrichment/enrichment-client.interface';
import { localFallbackReply } from '../fallback/local-fallback';
import { SessionHistory } from '../history/session-history';
import { resolveMode } from '../modes/mode-resolver';
import type { ChatMode } from '../modes/mode.config';
import { assembleMessages } from '../prompts/prompt-assembler';
import { SystemPromptRegistry } from '../prompts/system-prompt.registry';
import type { ChatEngineCollaborators, ChatEngineOptions, TurnResult } from './chat-engine.types';

/**
 * Chat Engine
 *
 * Mode-aware conversation with a bounded memory. One instance per session;
 * turns on the same instance must not interleave (callers serialize them).
 *
 * A turn always produces a reply: missing context and failed completions
 * are recovered here and never surface to the caller.
 */
export class ChatEngine {
    private readonly logger = new Logger(ChatEngine.name);
    private readonly history: SessionHistory;
    private readonly prompts: SystemPromptRegistry;

    constructor(
        private readonly options: ChatEngineOptions,
        private readonly collaborators: ChatEngineCollaborators,
    ) {
        this.history = new SessionHistory(options.historyCapacity);
        this.prompts = new SystemPromptRegistry(options.systemPrompts ?? DEFAULT_SYSTEM_PROMPTS);
    }

    get capacity(): number {
        return this.history.capacity;
    }

    async respond(userInput: string, modeLabel?: string | null): Promise<string> {
        const { reply } = await this.runTurn(userInput, modeLabel);
        return reply;
    }

    async runTurn(userInput: string, modeLabel?: string | null): Promise<TurnResult> {
        const mode = resolveMode(modeLabel);
        const systemPrompt = this.prompts.get(mode);

        this.appendMessage(createMessage('user', userInput));

        const enrichment =
            mode === 'knowledge' && this.options.enrichKnowledgeMode
                ? await this.fetchContext(userInput)
                : undefined;

        const messages = assembleMessages({
            systemPrompt,
            enrichment,
            history: this.history.snapshot(),
            capacity: this.history.capacity,
        });

        const completion = await this.requestCompletion(messages);
        const reply = completion.ok ? completion.text : localFallbackReply(messages);

        this.appendMessage(createMessage('assistant', reply));

        return {
            reply,
            mode,
            usedFallback: !completion.ok,
            enriched: enrichment !== undefined,
            model: completion.ok ? completion.model : undefined,
            tokensUsed: completion.ok ? completion.tokensUsed : undefined,
        };
    }

    reset(): void {
        this.history.reset();
        this.logger.log('Chat history reset.');
    }

    getHistory(): readonly ChatMessage[] {
        return this.history.snapshot();
    }

    setSystemPrompt(mode: ChatMode, prompt: string): void {
        this.prompts.set(mode, prompt);
        this.logger.log(`System prompt updated for mode '${mode}'`);
    }

    getSystemPrompt(mode: ChatMode): string {
        return this.prompts.get(mode);
    }

    getSystemPrompts(): Record<ChatMode, string> {
        return this.prompts.entries();
    }

    private appendMessage(message: ChatMessage): void {
        const dropped = this.history.append(message);
        if (dropped > 0) {
            this.logger.debug(`Trimmed history by ${dropped} messages`);
        }
    }

    // Returns a formatted source block, or undefined when no usable context exists
    private async fetchContext(query: string): Promise<string | undefined> {
        const result = await this.collaborators.enrichment
            .lookup(query, this.options.enrichmentSentences)
            .catch((error: unknown): EnrichmentResult => ({
                ok: false,
                reason: 'error',
                message: error instanceof Error ? error.message : String(error),
            }));

        if (!result.ok) {
            this.logger.warn(`Knowledge enrichment skipped (${result.reason}): ${result.message}`);
            return undefined;
        }

        if (!result.summary.trim()) {
            this.logger.warn(`Knowledge enrichment skipped (empty): ${result.source} returned no text`);
            return undefined;
        }

        const block = formatSourceBlock(result);
        this.logger.log(`${result.source} context attached (${block.length} chars)`);
        return block;
    }

    private async requestCompletion(messages: readonly ChatMessage[]): Promise<CompletionResult> {
        const result = await this.collaborators.completion
            .complete(messages)
            .catch((error: unknown): CompletionResult => ({
                ok: false,
                reason: 'error',
                message: error instanceof Error ? error.message : String(error),
            }));

        if (!result.ok) {
            const label = result.reason === 'unavailable' ? 'Completion unavailable' : 'Completion failed';
            this.logger.error(`${label}: ${result.message}; returning local fallback.`);
        }

        return result;
    }
}
