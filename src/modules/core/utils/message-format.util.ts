import type { ModelMessage } from 'ai';
import type { ChatMessage } from '../types/chat-message.type';

// Convert role-tagged chat messages to the AI SDK's model message shape
export function toModelMessages(messages: readonly ChatMessage[]): ModelMessage[] {
    return messages.map((message): ModelMessage => {
        switch (message.role) {
            case 'system':
                return { role: 'system', content: message.content };
            case 'user':
                return { role: 'user', content: message.content };
            case 'assistant':
                return { role: 'assistant', content: message.content };
        }
    });
}
