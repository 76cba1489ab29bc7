import {
  SOLAR_SYSTEM_ANSWERS,
  SOLAR_SYSTEM_QUESTIONS,
  modelResponse,
} from '../../test/fixtures/solar-system-quiz';
import { InsufficientQuestionsError, QuizParseError } from './quiz.errors';
import { ParsedQuiz, QuizParseResult, parseQuizResponse } from './quiz-response.parser';

const request = { topic: 'Solar System', count: 5 };

function expectOk(result: QuizParseResult): ParsedQuiz {
  if (!result.ok) {
    throw new Error(`expected a quiz, got: ${result.error.message}`);
  }
  return result.quiz;
}

function expectError(result: QuizParseResult): QuizParseError {
  if (result.ok) {
    throw new Error('expected a parse error');
  }
  return result.error;
}

describe('parseQuizResponse', () => {
  describe('JSON output', () => {
    it('keeps every well-formed question in response order', () => {
      const quiz = expectOk(parseQuizResponse(modelResponse(), request));

      expect(quiz.title).toBe('Solar System Adventure');
      expect(quiz.questions.map((q) => q.prompt)).toEqual(
        SOLAR_SYSTEM_QUESTIONS.map((q) => q.question),
      );
      expect(quiz.questions.map((q) => q.answer)).toEqual(SOLAR_SYSTEM_ANSWERS);
      expect(quiz.questions.map((q) => q.id)).toEqual([1, 2, 3, 4, 5]);
      for (const question of quiz.questions) {
        expect(question.options).toHaveLength(4);
        expect(question.options).toContain(question.answer);
      }
      expect(quiz.rejected).toEqual([]);
    });

    it('maps lettered options to an ordered list', () => {
      const quiz = expectOk(parseQuizResponse(modelResponse(), request));

      expect(quiz.questions[0]).toEqual({
        id: 1,
        prompt: 'Which planet is closest to the Sun?',
        options: ['Venus', 'Mercury', 'Earth', 'Mars'],
        answer: 'Mercury',
        explanation: 'Mercury orbits nearest to the Sun.',
      });
    });

    it('ignores code fences and chatter around the JSON', () => {
      const raw = `Sure! Here is your quiz:\n\`\`\`json\n${modelResponse()}\n\`\`\`\nGood luck!`;

      const quiz = expectOk(parseQuizResponse(raw, request));

      expect(quiz.questions).toHaveLength(5);
    });

    it('falls back to the topic for the title', () => {
      const raw = JSON.stringify({ questions: SOLAR_SYSTEM_QUESTIONS });

      expect(expectOk(parseQuizResponse(raw, request)).title).toBe(
        'Solar System Quiz',
      );
    });

    it('never invents an answer for a question without one', () => {
      const questions = SOLAR_SYSTEM_QUESTIONS.map((q, index) =>
        index === 2 ? { ...q, correct_answer: undefined } : q,
      );

      const quiz = expectOk(
        parseQuizResponse(modelResponse(questions), { ...request, count: 4 }),
      );

      expect(quiz.questions.map((q) => q.prompt)).not.toContain(
        'What is the largest planet in the Solar System?',
      );
      expect(quiz.questions.map((q) => q.id)).toEqual([1, 2, 3, 4]);
      expect(quiz.rejected).toEqual([
        { index: 2, reason: 'missing correct answer' },
      ]);
    });

    it('fails with InsufficientQuestions when too few questions survive', () => {
      const questions = SOLAR_SYSTEM_QUESTIONS.map((q, index) =>
        index === 2 ? { ...q, correct_answer: undefined } : q,
      );

      const error = expectError(
        parseQuizResponse(modelResponse(questions), request),
      );

      expect(error).toBeInstanceOf(InsufficientQuestionsError);
      expect(error.kind).toBe('insufficient-questions');
      expect(error).toMatchObject({ requested: 5, recovered: 4 });
      expect(error.rejected).toEqual([
        { index: 2, reason: 'missing correct answer' },
      ]);
    });

    it('rejects an answer that is not one of the options', () => {
      const questions = [
        { ...SOLAR_SYSTEM_QUESTIONS[0], correct_answer: 'Pluto' },
        SOLAR_SYSTEM_QUESTIONS[1],
      ];

      const quiz = expectOk(
        parseQuizResponse(modelResponse(questions), { ...request, count: 1 }),
      );

      expect(quiz.questions[0].prompt).toBe(
        'Which planet is known as the Red Planet?',
      );
      expect(quiz.rejected).toEqual([
        { index: 0, reason: 'correct answer does not match any option' },
      ]);
    });

    it('truncates extra questions to the requested count', () => {
      const quiz = expectOk(
        parseQuizResponse(modelResponse(), { ...request, count: 3 }),
      );

      expect(quiz.questions.map((q) => q.answer)).toEqual([
        'Mercury',
        'Mars',
        'Jupiter',
      ]);
    });

    it('drops repeated questions before truncating', () => {
      const repeated = {
        ...SOLAR_SYSTEM_QUESTIONS[0],
        question: '  which planet is   CLOSEST to the Sun? ',
      };
      const questions = [
        SOLAR_SYSTEM_QUESTIONS[0],
        repeated,
        ...SOLAR_SYSTEM_QUESTIONS.slice(1),
      ];

      const quiz = expectOk(parseQuizResponse(modelResponse(questions), request));

      expect(quiz.questions.map((q) => q.answer)).toEqual(SOLAR_SYSTEM_ANSWERS);
      expect(quiz.rejected).toEqual([{ index: 1, reason: 'duplicate question' }]);
    });

    it('accepts the other answer and option shapes models produce', () => {
      const raw = JSON.stringify({
        questions: [
          {
            question: 'Which planet is closest to the Sun?',
            options: ['Venus', 'Mercury', 'Earth', 'Mars'],
            answer: 'mercury',
          },
          {
            prompt: 'Which planet is known as the Red Planet?',
            options: ['Jupiter', 'Saturn', 'Mars', 'Neptune'],
            correctIndex: 2,
          },
          {
            question: 'What is the largest planet in the Solar System?',
            options: ['Jupiter', 'Earth', 'Venus', 'Mercury'],
            correct_answer: 1,
          },
          {
            question: '4. Which planet has the most famous rings?',
            options: ['A. Uranus', 'B. Mercury', 'C. Venus', 'D. Saturn'],
            correct_answer: 'D. Saturn',
          },
          {
            question_text: 'What star is at the center of the Solar System?',
            options: { a: 'Polaris', b: 'The Sun', c: 'Sirius', d: 'Vega' },
            correctAnswer: '(b)',
          },
        ],
      });

      const quiz = expectOk(parseQuizResponse(raw, request));

      expect(quiz.questions.map((q) => q.answer)).toEqual(SOLAR_SYSTEM_ANSWERS);
      expect(quiz.questions[3]).toMatchObject({
        prompt: 'Which planet has the most famous rings?',
        options: ['Uranus', 'Mercury', 'Venus', 'Saturn'],
      });
    });

    it('reads a numeric answer as option text before a position', () => {
      const raw = JSON.stringify({
        questions: [
          {
            question: 'What is 2 + 2?',
            options: ['3', '4', '5', '6'],
            answer: '4',
          },
          {
            question: 'What is 10 - 5?',
            options: ['6', '5', '4', '3'],
            correct_answer: 5,
          },
          {
            question: 'What is 3 x 3?',
            options: ['6', '9', '12', '15'],
            correct_answer: '2',
          },
        ],
      });

      const quiz = expectOk(parseQuizResponse(raw, { topic: 'Math', count: 3 }));

      expect(quiz.questions.map((q) => q.answer)).toEqual(['4', '5', '9']);
    });

    it('accepts numbers and booleans as option values', () => {
      const raw = JSON.stringify({
        questions: [
          {
            question: 'What is 2 + 2?',
            options: { A: 3, B: 4, C: 5, D: 6 },
            correct_answer: 'B',
          },
          {
            question: 'In which year did the first crewed Moon landing happen?',
            options: [1965, 1969, 1972, 1975],
            answer: 1969,
          },
          {
            question: 'Is the Sun a star?',
            options: [true, false],
            answer: 'true',
          },
        ],
      });

      const quiz = expectOk(parseQuizResponse(raw, { topic: 'Mixed', count: 3 }));

      expect(quiz.questions.map((q) => q.options)).toEqual([
        ['3', '4', '5', '6'],
        ['1965', '1969', '1972', '1975'],
        ['true', 'false'],
      ]);
      expect(quiz.questions.map((q) => q.answer)).toEqual(['4', '1969', 'true']);
      expect(quiz.rejected).toEqual([]);
    });

    it('keeps code fences that are part of a question', () => {
      const question = 'What does ```git status``` print for a clean tree?';
      const raw = `\`\`\`json\n${JSON.stringify({
        questions: [
          {
            question,
            options: { A: 'nothing to commit', B: 'fatal error' },
            correct_answer: 'A',
          },
        ],
      })}\n\`\`\``;

      const quiz = expectOk(parseQuizResponse(raw, { topic: 'Git', count: 1 }));

      expect(quiz.questions[0].prompt).toBe(question);
      expect(quiz.questions[0].answer).toBe('nothing to commit');
    });

    it('rejects questions with repeated options', () => {
      const raw = JSON.stringify({
        questions: [
          {
            question: 'Which planet is closest to the Sun?',
            options: ['Mercury', 'mercury', 'Earth', 'Mars'],
            answer: 'A',
          },
        ],
      });

      const error = expectError(parseQuizResponse(raw, { ...request, count: 1 }));

      expect(error.rejected).toEqual([{ index: 0, reason: 'duplicate options' }]);
    });

    it('reports an empty question list as insufficient', () => {
      const error = expectError(
        parseQuizResponse('{"questions": []}', request),
      );

      expect(error).toMatchObject({ requested: 5, recovered: 0 });
    });
  });

  describe('numbered text output', () => {
    const text = [
      'Here is your quiz:',
      '',
      '1. Which planet is closest to the Sun?',
      'A) Venus',
      'B) Mercury',
      'C) Earth',
      'D) Mars',
      'Answer: B',
      'Explanation: Mercury orbits nearest to the Sun.',
      '',
      'Question 3: Which planet is known as the Red Planet?',
      'a. Jupiter',
      'b. Saturn',
      'c. Mars',
      'd. Neptune',
      'Correct answer: Mars',
      '',
      '7) What is the largest planet',
      'in the Solar System?',
      '(A) Jupiter',
      '(B) Earth',
      '(C) Venus',
      '(D) Mercury',
      'Answer: A',
    ].join('\n');

    it('tolerates inconsistent numbering and option labels', () => {
      const quiz = expectOk(parseQuizResponse(text, { ...request, count: 3 }));

      expect(quiz.title).toBe('Solar System Quiz');
      expect(quiz.questions).toEqual([
        {
          id: 1,
          prompt: 'Which planet is closest to the Sun?',
          options: ['Venus', 'Mercury', 'Earth', 'Mars'],
          answer: 'Mercury',
          explanation: 'Mercury orbits nearest to the Sun.',
        },
        {
          id: 2,
          prompt: 'Which planet is known as the Red Planet?',
          options: ['Jupiter', 'Saturn', 'Mars', 'Neptune'],
          answer: 'Mars',
        },
        {
          id: 3,
          prompt: 'What is the largest planet in the Solar System?',
          options: ['Jupiter', 'Earth', 'Venus', 'Mercury'],
          answer: 'Jupiter',
        },
      ]);
    });

    it('excludes a question without an answer line', () => {
      const withoutMarker = text.replace('Correct answer: Mars\n', '');

      const error = expectError(
        parseQuizResponse(withoutMarker, { ...request, count: 3 }),
      );

      expect(error).toMatchObject({ requested: 3, recovered: 2 });
      expect(error.rejected).toEqual([
        { index: 1, reason: 'missing correct answer' },
      ]);
    });
  });

  it('fails on an empty response', () => {
    const error = expectError(parseQuizResponse('  \n ', request));

    expect(error.reason).toBe('empty');
    expect(error.kind).toBe('parse');
  });

  it('fails on output without any questions', () => {
    const error = expectError(
      parseQuizResponse("Sorry, I can't help with that.", request),
    );

    expect(error.reason).toBe('malformed');
    expect(error.message).toBe(
      'The model response did not contain any quiz questions.',
    );
  });
});
