import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../quiz/quiz.errors';

export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty({ message: 'OPENAI_API_KEY is required' })
  OPENAI_API_KEY!: string;

  @IsString()
  @IsNotEmpty()
  OPENAI_MODEL: string = 'gpt-4o-mini';

  @IsOptional()
  @IsUrl({ require_tld: false })
  OPENAI_BASE_URL?: string;

  @IsInt()
  @Min(256)
  OPENAI_MAX_TOKENS: number = 4096;

  @IsInt()
  @Min(1000)
  @Max(300000)
  QUIZ_REQUEST_TIMEOUT_MS: number = 30000;

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3001;

  @IsString()
  FRONTEND_URLS: string = 'http://localhost:3000';

  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;
}

/**
 * `validate` hook for `ConfigModule.forRoot`. Reports every invalid variable
 * at once so a misconfigured deployment fails on startup.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new ConfigurationError(
      errors.flatMap((error) => Object.values(error.constraints ?? {})),
    );
  }
  return validated;
}
