import type { ChatMessage } from '../../core/types/chat-message.type';

/**
 * Ordered, capacity-bounded message buffer for one session.
 *
 * Appends past capacity drop the oldest messages so that the length
 * never exceeds `capacity`; survivors keep their relative order.
 */
export class SessionHistory {
    private messages: ChatMessage[] = [];

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
        }
    }

    get length(): number {
        return this.messages.length;
    }

    /** Appends a message and returns how many old messages were dropped. */
    append(message: ChatMessage): number {
        this.messages.push(message);

        const overflow = Math.max(0, this.messages.length - this.capacity);
        if (overflow > 0) {
            this.messages.splice(0, overflow);
        }
        return overflow;
    }

    snapshot(): readonly ChatMessage[] {
        return Object.freeze([...this.messages]);
    }

    reset(): void {
        this.messages = [];
    }
}
