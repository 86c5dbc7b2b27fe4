import { Module } from '@nestjs/common';
import { KnowledgeModule } from '../knowledge/knowledge.module';
import { ChatController } from './chat.controller';
import { ChatSessionService } from './chat-session.service';

/**
 * Chat Module
 *
 * HTTP surface and in-memory sessions for mode-aware chat.
 * COMPLETION_CLIENT comes from the @Global CoreModule.
 */
@Module({
    imports: [KnowledgeModule],
    controllers: [ChatController],
    providers: [ChatSessionService],
    exports: [ChatSessionService],
})
export class ChatModule { }
