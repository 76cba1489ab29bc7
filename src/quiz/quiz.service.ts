import { Inject, Injectable, Logger } from '@nestjs/common';
import { CreateQuizDto } from './dto/create-quiz.dto';
import { QUIZ_LLM_CLIENT, QuizLlmClient } from './llm/quiz-llm.client';
import { assertQuizIntegrity, gradeQuiz } from './quiz-grader';
import { buildQuizPrompt } from './quiz-prompt.builder';
import { parseQuizResponse } from './quiz-response.parser';
import {
  QuizDifficulty,
  QuizGrade,
  QuizRequest,
  QuizResponse,
} from './types/quiz-question.interface';

@Injectable()
export class QuizService {
  private readonly logger = new Logger(QuizService.name);

  constructor(
    @Inject(QUIZ_LLM_CLIENT) private readonly llmClient: QuizLlmClient,
  ) {}

  async generateQuiz(
    dto: CreateQuizDto,
    signal?: AbortSignal,
  ): Promise<QuizResponse> {
    const request = this.toQuizRequest(dto);
    // Throws before any network call when the request is invalid.
    const prompt = buildQuizPrompt(request);

    const content = await this.llmClient.complete(prompt, {
      temperature: this.resolveTemperature(request.difficulty),
      signal,
    });

    const result = parseQuizResponse(content, request);
    if (!result.ok) {
      this.logger.warn(
        `Could not build a quiz on "${request.topic}": ${result.error.message}`,
      );
      for (const rejected of result.error.rejected) {
        this.logger.debug(
          `Rejected question #${rejected.index + 1}: ${rejected.reason}`,
        );
      }
      throw result.error;
    }

    const { title, questions, rejected } = result.quiz;
    if (rejected.length > 0) {
      this.logger.debug(
        `Dropped ${rejected.length} question(s) from the model output: ${rejected
          .map((item) => `#${item.index + 1} ${item.reason}`)
          .join(', ')}`,
      );
    }
    this.logger.log(
      `Generated ${questions.length} ${request.difficulty} question(s) on "${request.topic}"`,
    );

    return {
      topic: request.topic,
      difficulty: request.difficulty,
      title,
      count: questions.length,
      questions,
      generatedAt: new Date().toISOString(),
    };
  }

  gradeQuiz(
    quiz: QuizResponse,
    selections: ReadonlyArray<number | undefined>,
  ): QuizGrade {
    assertQuizIntegrity(quiz);
    return gradeQuiz(quiz, selections);
  }

  private toQuizRequest(dto: CreateQuizDto): QuizRequest {
    const name = dto.name?.trim();
    const audience =
      name || dto.age !== undefined
        ? {
            ...(name ? { name } : {}),
            ...(dto.age !== undefined ? { age: dto.age } : {}),
          }
        : undefined;

    return Object.freeze({
      topic: dto.topic.trim(),
      difficulty: dto.difficulty,
      count: dto.count,
      ...(audience ? { audience } : {}),
    });
  }

  private resolveTemperature(difficulty: QuizDifficulty): number {
    switch (difficulty) {
      case 'easy':
        return 0.4;
      case 'hard':
        return 0.8;
      default:
        return 0.6;
    }
  }
}
