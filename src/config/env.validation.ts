import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

class EnvironmentVariables {
  // Remote LLM service
  @IsUrl({ require_tld: false, require_protocol: true })
  LLM_BASE_URL!: string;

  @IsString()
  @IsOptional()
  LLM_TENANT?: string;

  @IsString()
  @IsNotEmpty()
  LLM_CLIENT_ID!: string;

  @IsString()
  @IsNotEmpty()
  LLM_CLIENT_SECRET!: string;

  @IsString()
  @IsOptional()
  LLM_APP_TO_ACCESS?: string;

  @IsString()
  @IsOptional()
  LLM_AGENT_NAME?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  LLM_REQUEST_TIMEOUT_MS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  LLM_AUTH_TIMEOUT_MS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  LLM_HEALTH_TIMEOUT_MS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  LLM_TOKEN_EXPIRY_SKEW_SECONDS?: number;

  // Retrieval
  @IsString()
  @IsOptional()
  RAG_DOCUMENTS_PATH?: string;

  @IsString()
  @IsOptional()
  RAG_SUPPORTED_FILE_TYPES?: string;

  @IsIn(['true', 'false'])
  @IsOptional()
  RAG_RECURSE_FOLDERS?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  RAG_TOP_K?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  RAG_MAX_TOKENS?: number;

  @IsNumber()
  @Min(0)
  @Max(2)
  @IsOptional()
  RAG_TEMPERATURE?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  RAG_CONTEXT_PREVIEW_LENGTH?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  EMBEDDING_DIMENSION?: number;

  // General Configuration
  @IsIn(['development', 'production', 'test'])
  @IsOptional()
  NODE_ENV?: string;

  @IsNumber()
  @IsOptional()
  PORT?: number;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(
      `❌ Environment validation failed!\n\nMissing or invalid variables:\n${errors
        .map((err) => `  - ${err.property}: ${Object.values(err.constraints || {}).join(', ')}`)
        .join('\n')}\n\nPlease check your .env file and ensure all required variables are set.`,
    );
  }

  return validatedConfig;
}
