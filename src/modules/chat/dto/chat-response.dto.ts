import type { ChatMessage } from '../../core/types/chat-message.type';
import type { ChatMode } from '../modes/mode.config';
import type { SessionInfo, SessionTurnResult } from '../chat-session.service';

export class SessionResponseDto {
    id: string;
    createdAt: Date;
    updatedAt: Date;
    messageCount: number;
    messages?: readonly ChatMessage[];
    systemPrompts?: Record<ChatMode, string>;

    constructor(
        info: SessionInfo,
        detail?: { messages: readonly ChatMessage[]; systemPrompts: Record<ChatMode, string> },
    ) {
        this.id = info.id;
        this.createdAt = info.createdAt;
        this.updatedAt = info.updatedAt;
        this.messageCount = info.messageCount;
        this.messages = detail?.messages;
        this.systemPrompts = detail?.systemPrompts;
    }
}

export class ChatReplyDto {
    reply: string;
    mode: ChatMode;
    usedFallback: boolean;
    enriched: boolean;
    model?: string;
    tokensUsed?: number;
    historyLength: number;

    constructor(result: SessionTurnResult) {
        this.reply = result.reply;
        this.mode = result.mode;
        this.usedFallback = result.usedFallback;
        this.enriched = result.enriched;
        this.model = result.model;
        this.tokensUsed = result.tokensUsed;
        this.historyLength = result.historyLength;
    }
}
