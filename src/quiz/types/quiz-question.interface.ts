export type QuizDifficulty = 'easy' | 'medium' | 'hard';

export const QUIZ_DIFFICULTIES: QuizDifficulty[] = [
  'easy',
  'medium',
  'hard',
];

export interface QuizAudience {
  name?: string;
  age?: number;
}

export interface QuizRequest {
  readonly topic: string;
  readonly difficulty: QuizDifficulty;
  readonly count: number;
  readonly audience?: QuizAudience;
}

export interface QuizQuestion {
  id: number;
  prompt: string;
  options: string[];
  answer: string;
  explanation?: string;
}

export interface QuizResponse {
  topic: string;
  difficulty: QuizDifficulty;
  title: string;
  count: number;
  questions: QuizQuestion[];
  generatedAt: string;
}

export interface WrongAnswer {
  questionId: number;
  question: string;
  selected: string;
  correct: string;
  explanation?: string;
}

export interface QuizGrade {
  score: number;
  total: number;
  percentage: number;
  wrongAnswers: WrongAnswer[];
}

export function isQuizDifficulty(value: unknown): value is QuizDifficulty {
  return value === 'easy' || value === 'medium' || value === 'hard';
}

/** `0 → 'A'`, `1 → 'B'`, ... */
export function optionLetter(index: number): string {
  return String.fromCharCode(65 + index);
}

export function formatOption(options: string[], index: number): string {
  return `${optionLetter(index)}. ${options[index]}`;
}
