import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import type { ChatConfig } from '../../config/chat.config';
import { DEFAULT_SYSTEM_PROMPTS } from '../core/prompts';
import { COMPLETION_CLIENT, type CompletionClient } from '../core/completion/completion-client.interface';
import type { ChatMessage } from '../core/types/chat-message.type';
import { ENRICHMENT_CLIENT, type EnrichmentClient } from '../knowledge/enrichment/enrichment-client.interface';
import { ChatEngine } from './engine/chat.engine';
import type { TurnResult } from './engine/chat-engine.types';
import type { ChatMode } from './modes/mode.config';

interface SessionEntry {
    id: string;
    engine: ChatEngine;
    createdAt: Date;
    updatedAt: Date;
    /** Tail of the turn queue; each turn starts after the previous settles */
    queue: Promise<void>;
}

/** Turn outcome plus the session's history length right after the turn */
export interface SessionTurnResult extends TurnResult {
    historyLength: number;
}

export interface SessionInfo {
    id: string;
    createdAt: Date;
    updatedAt: Date;
    messageCount: number;
}

/**
 * Chat Session Service
 *
 * Keeps one ChatEngine per session in memory. Turns on the same session
 * run one at a time; different sessions proceed independently.
 * When the session limit is reached the oldest session is evicted (FIFO).
 */
@Injectable()
export class ChatSessionService {
    private readonly logger = new Logger(ChatSessionService.name);
    private readonly sessions = new Map<string, SessionEntry>();
    private readonly config: ChatConfig;

    constructor(
        configService: ConfigService,
        @Inject(COMPLETION_CLIENT) private readonly completion: CompletionClient,
        @Inject(ENRICHMENT_CLIENT) private readonly enrichment: EnrichmentClient,
    ) {
        this.config = configService.getOrThrow<ChatConfig>('chat');
    }

    createSession(): SessionInfo {
        if (this.sessions.size >= this.config.maxSessions) {
            const oldestId = this.sessions.keys().next().value;
            if (oldestId !== undefined) {
                this.sessions.delete(oldestId);
                this.logger.debug(`Session limit reached, evicted oldest session: ${oldestId}`);
            }
        }

        const now = new Date();
        const entry: SessionEntry = {
            id: randomUUID(),
            engine: this.createEngine(),
            createdAt: now,
            updatedAt: now,
            queue: Promise.resolve(),
        };
        this.sessions.set(entry.id, entry);
        this.logger.log(`Session created: ${entry.id}`);

        return this.toInfo(entry);
    }

    listSessions(): SessionInfo[] {
        return Array.from(this.sessions.values(), (entry) => this.toInfo(entry));
    }

    getSession(sessionId: string): SessionInfo {
        return this.toInfo(this.getEntry(sessionId));
    }

    deleteSession(sessionId: string): void {
        this.getEntry(sessionId);
        this.sessions.delete(sessionId);
        this.logger.log(`Session deleted: ${sessionId}`);
    }

    async sendMessage(sessionId: string, message: string, mode?: string): Promise<SessionTurnResult> {
        const entry = this.getEntry(sessionId);

        // The entry may be deleted while the turn waits; read its engine, not the map
        const turn = entry.queue.then(async (): Promise<SessionTurnResult> => {
            const result = await entry.engine.runTurn(message, mode);
            return { ...result, historyLength: entry.engine.getHistory().length };
        });
        entry.queue = turn.then(
            () => undefined,
            () => undefined,
        );

        const result = await turn;
        entry.updatedAt = new Date();
        return result;
    }

    getHistory(sessionId: string): readonly ChatMessage[] {
        return this.getEntry(sessionId).engine.getHistory();
    }

    resetHistory(sessionId: string): void {
        const entry = this.getEntry(sessionId);
        entry.engine.reset();
        entry.updatedAt = new Date();
    }

    getSystemPrompts(sessionId: string): Record<ChatMode, string> {
        return this.getEntry(sessionId).engine.getSystemPrompts();
    }

    setSystemPrompt(sessionId: string, mode: ChatMode, prompt: string): Record<ChatMode, string> {
        const entry = this.getEntry(sessionId);
        entry.engine.setSystemPrompt(mode, prompt);
        entry.updatedAt = new Date();
        return entry.engine.getSystemPrompts();
    }

    private createEngine(): ChatEngine {
        return new ChatEngine(
            {
                historyCapacity: this.config.historyCapacity,
                enrichKnowledgeMode: this.config.enrichKnowledgeMode,
                enrichmentSentences: this.config.enrichmentSentences,
                systemPrompts: { ...DEFAULT_SYSTEM_PROMPTS, ...this.config.systemPrompts },
            },
            { completion: this.completion, enrichment: this.enrichment },
        );
    }

    private getEntry(sessionId: string): SessionEntry {
        const entry = this.sessions.get(sessionId);
        if (!entry) {
            throw new NotFoundException(`Chat session ${sessionId} not found`);
        }
        return entry;
    }

    private toInfo(entry: SessionEntry): SessionInfo {
        return {
            id: entry.id,
            createdAt: entry.createdAt,
            updatedAt: entry.updatedAt,
            messageCount: entry.engine.getHistory().length,
        };
    }
}
