/**
 * Chat message types shared by the engine and the completion client.
 */

export type Role = 'system' | 'user' | 'assistant';

/** A single role-tagged message. Sequence order encodes chronology. */
export type ChatMessage = Readonly<{
    role: Role;
    content: string;
}>;

// Messages are frozen on creation so history snapshots can be handed out safely
export function createMessage(role: Role, content: string): ChatMessage {
    return Object.freeze({ role, content });
}
