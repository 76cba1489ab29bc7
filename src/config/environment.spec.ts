import { ConfigurationError } from '../quiz/quiz.errors';
import { validateEnvironment } from './environment';
import { createQuizConfig } from './quiz.config';

function problemsOf(config: Record<string, unknown>): string[] {
  try {
    validateEnvironment(config);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.problems;
    }
    throw error;
  }
  throw new Error('expected a configuration error');
}

describe('validateEnvironment', () => {
  it('fails fast without an API key', () => {
    expect(problemsOf({})).toContain('OPENAI_API_KEY is required');
  });

  it('fills in defaults', () => {
    const env = validateEnvironment({ OPENAI_API_KEY: 'test-key' });

    expect(env).toMatchObject({
      OPENAI_API_KEY: 'test-key',
      OPENAI_MODEL: 'gpt-4o-mini',
      OPENAI_MAX_TOKENS: 4096,
      QUIZ_REQUEST_TIMEOUT_MS: 30000,
      PORT: 3001,
      FRONTEND_URLS: 'http://localhost:3000',
    });
    expect(env.OPENAI_BASE_URL).toBeUndefined();
  });

  it('converts numeric strings', () => {
    const env = validateEnvironment({
      OPENAI_API_KEY: 'test-key',
      PORT: '8080',
      QUIZ_REQUEST_TIMEOUT_MS: '5000',
    });

    expect(env.PORT).toBe(8080);
    expect(env.QUIZ_REQUEST_TIMEOUT_MS).toBe(5000);
  });

  it('reports every invalid variable at once', () => {
    const problems = problemsOf({
      OPENAI_API_KEY: 'test-key',
      PORT: 'not-a-port',
      QUIZ_REQUEST_TIMEOUT_MS: '10',
      NODE_ENV: 'staging',
    });

    expect(problems).toEqual(
      expect.arrayContaining([
        'PORT must be an integer number',
        'QUIZ_REQUEST_TIMEOUT_MS must not be less than 1000',
        'NODE_ENV must be one of the following values: development, production, test',
      ]),
    );
  });
});

describe('createQuizConfig', () => {
  it('builds a frozen config with the allowed origins split out', () => {
    const config = createQuizConfig({
      OPENAI_API_KEY: 'test-key',
      OPENAI_MODEL: 'gpt-4o-mini',
      OPENAI_MAX_TOKENS: 4096,
      QUIZ_REQUEST_TIMEOUT_MS: 30000,
      PORT: 3001,
      FRONTEND_URLS: 'http://a.test, http://b.test,',
      NODE_ENV: 'production',
    });

    expect(config).toEqual({
      openaiApiKey: 'test-key',
      openaiModel: 'gpt-4o-mini',
      maxTokens: 4096,
      requestTimeoutMs: 30000,
      port: 3001,
      allowedOrigins: ['http://a.test', 'http://b.test'],
      isProduction: true,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });
});
