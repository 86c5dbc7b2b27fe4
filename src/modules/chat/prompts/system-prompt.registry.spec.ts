import { DEFAULT_SYSTEM_PROMPTS } from '../../core/prompts';
import { SystemPromptRegistry } from './system-prompt.registry';

describe('SystemPromptRegistry', () => {
    it('is seeded with the default prompts', () => {
        const registry = new SystemPromptRegistry();

        expect(registry.get('chat')).toBe(DEFAULT_SYSTEM_PROMPTS.chat);
        expect(registry.get('code')).toBe(DEFAULT_SYSTEM_PROMPTS.code);
        expect(registry.get('knowledge')).toBe(DEFAULT_SYSTEM_PROMPTS.knowledge);
    });

    it('returns exactly what was set', () => {
        const registry = new SystemPromptRegistry();
        registry.set('code', 'Answer only in pseudo-code.');

        expect(registry.get('code')).toBe('Answer only in pseudo-code.');
    });

    it('overwrites silently, including with empty text', () => {
        const registry = new SystemPromptRegistry();
        registry.set('chat', 'first');
        registry.set('chat', '');

        expect(registry.get('chat')).toBe('');
    });

    it('falls back to the chat default for modes missing from a partial map', () => {
        const registry = new SystemPromptRegistry({ chat: 'Custom chat prompt' });

        expect(registry.get('chat')).toBe('Custom chat prompt');
        expect(registry.get('code')).toBe(DEFAULT_SYSTEM_PROMPTS.chat);
    });

    it('lists effective prompts for every mode', () => {
        const registry = new SystemPromptRegistry({ knowledge: 'K' });

        expect(registry.entries()).toEqual({
            chat: DEFAULT_SYSTEM_PROMPTS.chat,
            code: DEFAULT_SYSTEM_PROMPTS.chat,
            knowledge: 'K',
        });
    });
});
