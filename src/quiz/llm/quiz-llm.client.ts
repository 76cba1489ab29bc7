import type { QuizPrompt } from '../quiz-prompt.builder';

export const QUIZ_LLM_CLIENT = Symbol('QUIZ_LLM_CLIENT');

export interface QuizCompletionOptions {
  temperature: number;
  /** Aborts the in-flight call; the result is discarded. */
  signal?: AbortSignal;
}

/** Sends a quiz prompt to a language model and returns its raw text. */
export interface QuizLlmClient {
  complete(prompt: QuizPrompt, options: QuizCompletionOptions): Promise<string>;
}
