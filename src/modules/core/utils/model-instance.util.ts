import type { LanguageModel } from 'ai';
import { PROVIDERS } from '../config/provider.config';
import type { ModelSettings } from './model-loader.util';

// Get a model instance from the configured provider
export function getModelInstance(settings: ModelSettings): LanguageModel {
    if (!settings.apiKey) {
        throw new Error(`Provider "${settings.provider}" has no API key configured`);
    }

    const providerFactory = PROVIDERS[settings.provider];

    return providerFactory(settings.model, {
        apiKey: settings.apiKey,
        baseURL: settings.baseURL,
    });
}
