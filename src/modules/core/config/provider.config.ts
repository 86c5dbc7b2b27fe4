import { createGroq } from '@ai-sdk/groq';
import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';

export const PROVIDER_NAMES = ['openai', 'groq'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface ProviderCredentials {
    apiKey: string;
    baseURL?: string;
}

// Provider factory function type
export type ProviderFactory = (modelName: string, credentials: ProviderCredentials) => LanguageModel;

export const PROVIDERS: Record<ProviderName, ProviderFactory> = {
    // Chat Completions endpoint, same request shape as the hosted chat API
    openai: (modelName, { apiKey, baseURL }) => createOpenAI({ apiKey, baseURL }).chat(modelName),
    groq: (modelName, { apiKey, baseURL }) => createGroq({ apiKey, baseURL })(modelName),
} as const;

// Default provider (used if not specified)
export const DEFAULT_PROVIDER: ProviderName = 'openai';

export function isProviderName(value: string): value is ProviderName {
    return (PROVIDER_NAMES as readonly string[]).includes(value);
}
