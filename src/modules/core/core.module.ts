import { Module, Global } from '@nestjs/common';
import { AIService } from './ai.service';
import { COMPLETION_CLIENT, type CompletionClient } from './completion/completion-client.interface';
import { UnavailableCompletionClient } from './completion/unavailable-completion.client';

/**
 * Core Module
 * 
 * Provides fundamental services used across multiple modules.
 * Marked as @Global so exports are available everywhere without explicit imports.
 * 
 * Services:
 * - AIService: Low-level AI model interactions
 * - COMPLETION_CLIENT: AIService when credentials exist, otherwise an
 *   always-unavailable client (decided once, at assembly time)
 */
@Global()
@Module({
    providers: [
        AIService,
        {
            provide: COMPLETION_CLIENT,
            inject: [AIService],
            useFactory: (aiService: AIService): CompletionClient =>
                aiService.available
                    ? aiService
                    : new UnavailableCompletionClient(`Provider "${aiService.provider}" is not configured`),
        },
    ],
    exports: [AIService, COMPLETION_CLIENT],
})
export class CoreModule { }
