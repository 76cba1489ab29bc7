import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { QuizPayloadDto } from '../quiz/dto/quiz-payload.dto';
import { InvalidQuizRequestError } from '../quiz/quiz.errors';
import type { QuizResponse } from '../quiz/types/quiz-question.interface';

export type QuizForm = Record<string, unknown>;

/** Reads the quiz carried in the hidden `quiz` field of the web forms. */
export async function readQuizField(form: QuizForm): Promise<QuizResponse> {
  const raw = form.quiz;
  if (typeof raw !== 'string' || !raw.trim()) {
    throw new InvalidQuizRequestError('The quiz is missing from the form.');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new InvalidQuizRequestError('The submitted quiz could not be read.');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new InvalidQuizRequestError('The submitted quiz could not be read.');
  }

  const quiz = plainToInstance(QuizPayloadDto, parsed);
  const errors = await validate(quiz, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });
  if (errors.length > 0) {
    throw new InvalidQuizRequestError('The submitted quiz is not valid.');
  }
  return quiz;
}

/** One zero-based selection per question, `undefined` where none was made. */
export function readSelections(
  form: QuizForm,
  quiz: QuizResponse,
): Array<number | undefined> {
  return quiz.questions.map((question) => {
    const value = form[`answer-${question.id}`];
    return typeof value === 'string' && /^\d+$/.test(value)
      ? Number(value)
      : undefined;
  });
}

export function readCheckbox(form: QuizForm, field: string): boolean {
  return form[field] === 'true' || form[field] === 'on';
}
