import { resolveModelSettings } from './model-loader.util';

describe('resolveModelSettings', () => {
    it('defaults to OpenAI with the chat generation parameters', () => {
        expect(resolveModelSettings({})).toEqual({
            provider: 'openai',
            model: 'gpt-4o-mini',
            apiKey: undefined,
            baseURL: undefined,
            temperature: 0.3,
            maxOutputTokens: 600,
            timeoutMs: undefined,
        });
    });

    it('reads the provider-specific model and key', () => {
        const settings = resolveModelSettings({
            AI_PROVIDER: 'Groq',
            GROQ_API_KEY: 'test-key',
            GROQ_MODEL: 'llama-3.3-70b-versatile',
            OPENAI_API_KEY: 'ignored',
        });

        expect(settings).toMatchObject({
            provider: 'groq',
            model: 'llama-3.3-70b-versatile',
            apiKey: 'test-key',
        });
    });

    it('falls back to the default provider for unknown names', () => {
        expect(resolveModelSettings({ AI_PROVIDER: 'mystery' }).provider).toBe('openai');
    });

    it('parses numeric settings and ignores malformed ones', () => {
        const settings = resolveModelSettings({
            AI_TEMPERATURE: '0.9',
            AI_MAX_TOKENS: 'lots',
            AI_TIMEOUT_MS: '15000',
        });

        expect(settings.temperature).toBe(0.9);
        expect(settings.maxOutputTokens).toBe(600);
        expect(settings.timeoutMs).toBe(15000);
    });

    it('treats blank values as unset', () => {
        expect(resolveModelSettings({ OPENAI_API_KEY: '  ', OPENAI_MODEL: '' })).toMatchObject({
            apiKey: undefined,
            model: 'gpt-4o-mini',
        });
    });
});
