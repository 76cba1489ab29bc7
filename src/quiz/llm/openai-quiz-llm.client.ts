import { Inject, Injectable, Logger } from '@nestjs/common';
import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { QUIZ_CONFIG, QuizConfig } from '../../config/quiz.config';
import type { QuizPrompt } from '../quiz-prompt.builder';
import { QuizApiError } from '../quiz.errors';
import type { QuizCompletionOptions, QuizLlmClient } from './quiz-llm.client';

@Injectable()
export class OpenAiQuizLlmClient implements QuizLlmClient {
  private readonly logger = new Logger(OpenAiQuizLlmClient.name);
  private readonly openai: OpenAI;

  constructor(@Inject(QUIZ_CONFIG) private readonly config: QuizConfig) {
    this.openai = new OpenAI({
      apiKey: config.openaiApiKey,
      baseURL: config.openaiBaseUrl,
      timeout: config.requestTimeoutMs,
      maxRetries: 0,
    });
    this.logger.log(
      `LLM integration enabled with model "${config.openaiModel}"`,
    );
  }

  async complete(
    prompt: QuizPrompt,
    { temperature, signal }: QuizCompletionOptions,
  ): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: prompt.system },
      { role: 'user', content: prompt.user },
    ];

    const baseParams: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming =
      {
        model: this.config.openaiModel,
        messages,
        response_format: { type: 'json_object' },
        max_tokens: this.config.maxTokens,
      };

    // gpt-5 family models only accept the default temperature.
    const params = this.shouldUseCustomTemperature(this.config.openaiModel)
      ? { ...baseParams, temperature }
      : baseParams;

    let content: string | null | undefined;
    try {
      const completion = await this.openai.chat.completions.create(params, {
        signal,
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      throw this.toApiError(error);
    }

    if (!content || !content.trim()) {
      this.logger.warn('The completion did not contain any content.');
      throw new QuizApiError(
        'empty',
        'The quiz service returned an empty answer. Please try again.',
      );
    }
    return content;
  }

  private toApiError(error: unknown): QuizApiError {
    if (error instanceof OpenAI.APIUserAbortError) {
      this.logger.debug('Quiz generation was cancelled by the client.');
      return new QuizApiError('cancelled', 'The quiz request was cancelled.', undefined, {
        cause: error,
      });
    }
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      this.logger.error(
        `LLM call timed out after ${this.config.requestTimeoutMs}ms`,
      );
      return new QuizApiError(
        'timeout',
        'The quiz service did not respond in time. Please try again.',
        undefined,
        { cause: error },
      );
    }
    if (error instanceof OpenAI.APIConnectionError) {
      this.logger.error('LLM call failed to connect', error.message);
      return new QuizApiError(
        'network',
        'Could not reach the quiz service. Check your connection and try again.',
        undefined,
        { cause: error },
      );
    }
    if (error instanceof OpenAI.APIError) {
      this.logger.error(`LLM call failed with status ${error.status ?? 'unknown'}`, error.message);
      return new QuizApiError(
        'status',
        `The quiz service rejected the request (status ${error.status ?? 'unknown'}).`,
        error.status,
        { cause: error },
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error('LLM call failed', message);
    return new QuizApiError(
      'network',
      'Failed to generate the quiz. Please try again.',
      undefined,
      { cause: error },
    );
  }

  private shouldUseCustomTemperature(model: string): boolean {
    return !model.toLowerCase().startsWith('gpt-5');
  }
}
