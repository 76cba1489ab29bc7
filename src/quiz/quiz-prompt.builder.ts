import { InvalidQuizRequestError } from './quiz.errors';
import {
  QUIZ_DIFFICULTIES,
  QuizAudience,
  QuizRequest,
  isQuizDifficulty,
} from './types/quiz-question.interface';

export interface QuizPrompt {
  system: string;
  user: string;
}

const SYSTEM_PROMPT = [
  'You are a teacher who writes multiple-choice quizzes.',
  'Every question has exactly four options labelled A, B, C and D, and exactly one of them is correct.',
  'Explanations are one or two short sentences.',
  '',
  'STRICT RULES:',
  '- Output ONLY one valid JSON object',
  '- No markdown and no code blocks',
  '- No text before or after the JSON',
  '- correct_answer is the letter of the correct option',
].join('\n');

const RESPONSE_SCHEMA = `{
  "quiz_title": "string",
  "questions": [
    {
      "id": 1,
      "question": "string",
      "options": {
        "A": "string",
        "B": "string",
        "C": "string",
        "D": "string"
      },
      "correct_answer": "A",
      "explanation": "string"
    }
  ]
}`;

/**
 * Builds the chat prompt for a quiz request.
 *
 * The output only depends on the request, so the same request always yields
 * the same prompt. Throws {@link InvalidQuizRequestError} for an empty topic,
 * a count that is not a positive integer or an unknown difficulty.
 */
export function buildQuizPrompt(request: QuizRequest): QuizPrompt {
  const topic = assertValidRequest(request);
  const { count, difficulty } = request;

  const user = [
    `Generate a quiz with exactly ${count} ${
      count === 1 ? 'question' : 'questions'
    }.`,
    describeAudience(request.audience),
    '',
    'JSON format:',
    RESPONSE_SCHEMA,
    '',
    `Topic: ${topic}`,
    `Difficulty: ${difficulty}`,
    `Number of questions: ${count}`,
  ]
    .filter((line): line is string => line !== null)
    .join('\n');

  return { system: SYSTEM_PROMPT, user };
}

function assertValidRequest(request: QuizRequest): string {
  const topic = request.topic.trim();
  if (!topic) {
    throw new InvalidQuizRequestError('Please enter a topic for the quiz.');
  }
  if (!Number.isInteger(request.count) || request.count <= 0) {
    throw new InvalidQuizRequestError(
      'The number of questions must be a whole number greater than zero.',
    );
  }
  if (!isQuizDifficulty(request.difficulty)) {
    throw new InvalidQuizRequestError(
      `Difficulty must be one of: ${QUIZ_DIFFICULTIES.join(', ')}.`,
    );
  }
  return topic;
}

function describeAudience(audience: QuizAudience | undefined): string | null {
  const name = audience?.name?.trim();
  const age = audience?.age;
  if (!name && age === undefined) {
    return null;
  }

  const learner = [
    age !== undefined ? `a ${age}-year-old learner` : 'a learner',
    name ? `named ${name}` : null,
  ]
    .filter(Boolean)
    .join(' ');

  return `The quiz is for ${learner}. Keep the wording and explanations simple and friendly for them.`;
}
