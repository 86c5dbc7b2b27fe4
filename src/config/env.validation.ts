import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { PROVIDER_NAMES, type ProviderName } from '../modules/core/config/provider.config';

/**
 * Environment variables read at bootstrap. Everything is optional;
 * present values must be well formed.
 */
class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsUrl({ require_tld: false })
  FRONTEND_URL?: string;

  @IsOptional()
  @IsIn([...PROVIDER_NAMES])
  AI_PROVIDER?: ProviderName;

  @IsOptional()
  @IsString()
  OPENAI_MODEL?: string;

  @IsOptional()
  @IsString()
  GROQ_MODEL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  OPENAI_BASE_URL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  GROQ_BASE_URL?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(2)
  AI_TEMPERATURE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  AI_MAX_TOKENS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  AI_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  CHAT_HISTORY_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  CHAT_MAX_SESSIONS?: number;

  @IsOptional()
  @IsBooleanString()
  KNOWLEDGE_WIKI_ENABLED?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  KNOWLEDGE_SUMMARY_SENTENCES?: number;
}

// Fails fast at startup with every malformed variable listed
export function validateEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return config;
}
