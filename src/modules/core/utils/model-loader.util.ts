import { Logger } from '@nestjs/common';
import { DEFAULT_MAX_OUTPUT_TOKENS, DEFAULT_TEMPERATURE, MODEL_CONFIGS } from '../config/model.config';
import { DEFAULT_PROVIDER, isProviderName, type ProviderName } from '../config/provider.config';

export interface ModelSettings {
    provider: ProviderName;
    model: string;
    apiKey?: string;
    baseURL?: string;
    temperature: number;
    maxOutputTokens: number;
    timeoutMs?: number;
}

type Environment = Record<string, string | undefined>;

function readNumber(env: Environment, key: string, fallback: number): number {
    const raw = env[key]?.trim();
    if (!raw) {
        return fallback;
    }
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function readString(env: Environment, key: string): string | undefined {
    const raw = env[key]?.trim();
    return raw ? raw : undefined;
}

// Resolves provider, model and generation settings from environment variables
export function resolveModelSettings(env: Environment): ModelSettings {
    const requested = readString(env, 'AI_PROVIDER')?.toLowerCase();
    const provider = requested && isProviderName(requested) ? requested : DEFAULT_PROVIDER;
    const config = MODEL_CONFIGS[provider];
    const timeoutMs = readNumber(env, 'AI_TIMEOUT_MS', 0);

    return {
        provider,
        model: readString(env, config.modelEnvKey) ?? config.defaultModel,
        apiKey: readString(env, config.apiKeyEnvKey),
        baseURL: readString(env, config.baseUrlEnvKey),
        temperature: readNumber(env, 'AI_TEMPERATURE', DEFAULT_TEMPERATURE),
        maxOutputTokens: readNumber(env, 'AI_MAX_TOKENS', DEFAULT_MAX_OUTPUT_TOKENS),
        timeoutMs: timeoutMs > 0 ? timeoutMs : undefined,
    };
}

// Logs the loaded model settings (never the key itself)
export function logModelSettings(logger: Logger, settings: ModelSettings): void {
    const config = MODEL_CONFIGS[settings.provider];
    logger.log(`🤖 AI Service Initialized`);
    logger.log(`  - Provider: ${config.description} (from AI_PROVIDER)`);
    logger.log(`  - Model: ${settings.model} (from ${config.modelEnvKey})`);
    logger.log(`  - Temperature: ${settings.temperature} | Max tokens: ${settings.maxOutputTokens}`);
    if (settings.timeoutMs) {
        logger.log(`  - Timeout: ${settings.timeoutMs}ms`);
    }
}
