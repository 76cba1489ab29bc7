import { InvalidQuizRequestError } from './quiz.errors';
import {
  QuizGrade,
  QuizResponse,
  WrongAnswer,
  formatOption,
} from './types/quiz-question.interface';

/**
 * Checks that a quiz handed back by a client still holds together: ids are
 * the 1-based positions and every answer is one of its options.
 */
export function assertQuizIntegrity(quiz: QuizResponse): void {
  quiz.questions.forEach((question, index) => {
    if (question.id !== index + 1) {
      throw new InvalidQuizRequestError(
        `Question ${index + 1} has id ${question.id}; ids must follow the question order.`,
      );
    }
    if (!question.options.includes(question.answer)) {
      throw new InvalidQuizRequestError(
        `The answer to question ${question.id} is not one of its options.`,
      );
    }
  });
}

/**
 * Scores option selections (zero-based, one per question in order) against
 * the quiz. Every question must have a selection.
 */
export function gradeQuiz(
  quiz: QuizResponse,
  selections: ReadonlyArray<number | undefined>,
): QuizGrade {
  const total = quiz.questions.length;
  const complete =
    selections.length === total &&
    quiz.questions.every((question, index) => {
      const selected = selections[index];
      return (
        selected !== undefined &&
        Number.isInteger(selected) &&
        selected >= 0 &&
        selected < question.options.length
      );
    });
  if (!complete) {
    throw new InvalidQuizRequestError('Please answer all questions.');
  }

  const wrongAnswers: WrongAnswer[] = [];
  let score = 0;

  quiz.questions.forEach((question, index) => {
    const selected = selections[index] ?? -1;
    const correct = question.options.indexOf(question.answer);

    if (selected === correct) {
      score += 1;
      return;
    }

    wrongAnswers.push({
      questionId: question.id,
      question: question.prompt,
      selected: formatOption(question.options, selected),
      correct: formatOption(question.options, correct),
      ...(question.explanation ? { explanation: question.explanation } : {}),
    });
  });

  return {
    score,
    total,
    percentage: total > 0 ? Math.round((score / total) * 10000) / 100 : 0,
    wrongAnswers,
  };
}
