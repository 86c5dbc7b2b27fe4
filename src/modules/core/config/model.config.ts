// AI Model Configuration
// Environment keys and defaults for each supported provider

import type { ProviderName } from './provider.config';

export interface ModelConfig {
    modelEnvKey: string;      // Environment variable holding the model id
    apiKeyEnvKey: string;     // Environment variable holding the API key
    baseUrlEnvKey: string;    // Environment variable overriding the endpoint
    defaultModel: string;     // Fallback model id
    description: string;      // Human-readable description
}

export const MODEL_CONFIGS: Record<ProviderName, ModelConfig> = {
    openai: {
        modelEnvKey: 'OPENAI_MODEL',
        apiKeyEnvKey: 'OPENAI_API_KEY',
        baseUrlEnvKey: 'OPENAI_BASE_URL',
        defaultModel: 'gpt-4o-mini',
        description: 'OpenAI',
    },
    groq: {
        modelEnvKey: 'GROQ_MODEL',
        apiKeyEnvKey: 'GROQ_API_KEY',
        baseUrlEnvKey: 'GROQ_BASE_URL',
        defaultModel: 'llama-3.1-8b-instant',
        description: 'Groq',
    },
} as const;

// Generation parameters used for every chat turn
export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_OUTPUT_TOKENS = 600;
