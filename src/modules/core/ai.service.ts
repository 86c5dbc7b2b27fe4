import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { generateText, type LanguageModel } from 'ai';
import type { ChatMessage } from './types/chat-message.type';
import type { CompletionClient, CompletionResult } from './completion/completion-client.interface';
import { getModelInstance } from './utils/model-instance.util';
import { logModelSettings, type ModelSettings } from './utils/model-loader.util';
import { toModelMessages } from './utils/message-format.util';

@Injectable()
export class AIService implements CompletionClient {
    private readonly logger = new Logger(AIService.name);
    private readonly settings: ModelSettings;
    private readonly languageModel?: LanguageModel;

    constructor(private configService: ConfigService) {
        this.settings = this.configService.getOrThrow<ModelSettings>('ai');

        if (this.settings.apiKey) {
            this.languageModel = getModelInstance(this.settings);
            logModelSettings(this.logger, this.settings);
        } else {
            this.logger.warn(
                `No API key for provider "${this.settings.provider}"; chat turns will use the local fallback.`,
            );
        }
    }

    get available(): boolean {
        return this.languageModel !== undefined;
    }

    get model(): string {
        return this.settings.model;
    }

    get provider(): string {
        return this.settings.provider;
    }

    // Single non-streaming completion; no retries so turn latency stays bounded
    async complete(messages: readonly ChatMessage[]): Promise<CompletionResult> {
        if (!this.languageModel) {
            return {
                ok: false,
                reason: 'unavailable',
                message: `Provider "${this.settings.provider}" is not configured`,
            };
        }

        const { timeoutMs } = this.settings;

        try {
            this.logger.debug(`Generating response with model: ${this.settings.model} (${messages.length} messages)`);

            const result = await generateText({
                model: this.languageModel,
                messages: toModelMessages(messages),
                temperature: this.settings.temperature,
                maxOutputTokens: this.settings.maxOutputTokens,
                maxRetries: 0,
                abortSignal: timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined,
            });

            return {
                ok: true,
                text: result.text.trim(),
                model: this.settings.model,
                tokensUsed: result.usage.totalTokens,
            };
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error(`AI generation error: ${message}`);
            return { ok: false, reason: 'error', message };
        }
    }
}
