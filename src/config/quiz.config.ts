import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from './environment';

export const QUIZ_CONFIG = Symbol('QUIZ_CONFIG');

export interface QuizConfig {
  readonly openaiApiKey: string;
  readonly openaiModel: string;
  readonly openaiBaseUrl?: string;
  readonly maxTokens: number;
  readonly requestTimeoutMs: number;
  readonly port: number;
  readonly allowedOrigins: readonly string[];
  readonly isProduction: boolean;
}

export function createQuizConfig(
  env: Pick<
    EnvironmentVariables,
    | 'OPENAI_API_KEY'
    | 'OPENAI_MODEL'
    | 'OPENAI_BASE_URL'
    | 'OPENAI_MAX_TOKENS'
    | 'QUIZ_REQUEST_TIMEOUT_MS'
    | 'PORT'
    | 'FRONTEND_URLS'
    | 'NODE_ENV'
  >,
): QuizConfig {
  return Object.freeze({
    openaiApiKey: env.OPENAI_API_KEY,
    openaiModel: env.OPENAI_MODEL,
    ...(env.OPENAI_BASE_URL ? { openaiBaseUrl: env.OPENAI_BASE_URL } : {}),
    maxTokens: env.OPENAI_MAX_TOKENS,
    requestTimeoutMs: env.QUIZ_REQUEST_TIMEOUT_MS,
    port: env.PORT,
    allowedOrigins: Object.freeze(
      env.FRONTEND_URLS.split(',')
        .map((origin) => origin.trim())
        .filter(Boolean),
    ),
    isProduction: env.NODE_ENV === 'production',
  });
}

export const quizConfigProvider = {
  provide: QUIZ_CONFIG,
  inject: [ConfigService],
  useFactory: (
    configService: ConfigService<EnvironmentVariables, true>,
  ): QuizConfig =>
    createQuizConfig({
      OPENAI_API_KEY: configService.get('OPENAI_API_KEY', { infer: true }),
      OPENAI_MODEL: configService.get('OPENAI_MODEL', { infer: true }),
      OPENAI_BASE_URL: configService.get('OPENAI_BASE_URL', { infer: true }),
      OPENAI_MAX_TOKENS: configService.get('OPENAI_MAX_TOKENS', {
        infer: true,
      }),
      QUIZ_REQUEST_TIMEOUT_MS: configService.get('QUIZ_REQUEST_TIMEOUT_MS', {
        infer: true,
      }),
      PORT: configService.get('PORT', { infer: true }),
      FRONTEND_URLS: configService.get('FRONTEND_URLS', { infer: true }),
      NODE_ENV: configService.get('NODE_ENV', { infer: true }),
    }),
};
