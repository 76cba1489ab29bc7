import {
  InsufficientQuestionsError,
  QuizParseError,
  RejectedQuestion,
} from './quiz.errors';
import {
  QuizQuestion,
  QuizRequest,
  optionLetter,
} from './types/quiz-question.interface';

export interface ParsedQuiz {
  title: string;
  questions: QuizQuestion[];
  /** Questions dropped while parsing, by position in the model output. */
  rejected: RejectedQuestion[];
}

export type QuizParseResult =
  | { ok: true; quiz: ParsedQuiz }
  | { ok: false; error: QuizParseError };

interface LabeledOption {
  label: string;
  text: string;
}

interface QuestionCandidate {
  prompt: string;
  options: LabeledOption[];
  answer: unknown;
  /** `correctIndex` style answers count from zero, everything else from one. */
  zeroBasedAnswer: boolean;
  explanation?: string;
}

type LlmQuizQuestionPayload = {
  id?: unknown;
  question?: unknown;
  prompt?: unknown;
  question_text?: unknown;
  options?: unknown;
  correct_answer?: unknown;
  answer?: unknown;
  correctAnswer?: unknown;
  correctIndex?: unknown;
  explanation?: unknown;
};

type LlmQuizPayload = {
  quiz_title?: unknown;
  title?: unknown;
  questions: unknown[];
};

const QUESTION_LINE = /^(?:q(?:uestion)?\s*)?\d+\s*[.):]\s*(.+)$/i;
const OPTION_LINE = /^\(?([a-h])\s*[.):\]]\s+(.+)$/i;
const ANSWER_LINE = /^(?:correct\s+answer|correct|answer)\s*[:-]\s*(.+)$/i;
const EXPLANATION_LINE = /^explanation\s*[:-]\s*(.+)$/i;
const LABEL_ONLY = /^\(?([a-h])\)?[.):]?$/i;
const LABELED_TEXT = /^\(?([a-h])\s*[.):\]]\s+(.+)$/i;
const FENCE_LINE = /^```[a-z]*$/i;
const LEADING_NUMBER = /^\s*(?:q(?:uestion)?\s*)?\d+\s*[.):]\s+/i;

/**
 * Turns raw model output into a validated quiz.
 *
 * The JSON form requested by the prompt is tried first; when the output holds
 * no JSON object with a `questions` array, a numbered plain-text form
 * (`1. question`, `A) option`, `Answer: B`, `Explanation: ...`) is read
 * instead. Questions without a resolvable correct answer are dropped, repeated
 * questions keep their first occurrence, and anything past `count` is cut off.
 * Fewer than `count` usable questions is an {@link InsufficientQuestionsError}.
 */
export function parseQuizResponse(
  raw: string,
  request: Pick<QuizRequest, 'topic' | 'count'>,
): QuizParseResult {
  const text = stripCodeFences(raw);
  if (!text) {
    return fail(new QuizParseError('empty', 'The model returned an empty response.'));
  }

  const payload = extractJsonPayload(text);
  const candidates = payload
    ? payload.questions.map(readJsonQuestion)
    : tokenizeTextQuestions(text);

  if (!payload && candidates.length === 0) {
    return fail(
      new QuizParseError(
        'malformed',
        'The model response did not contain any quiz questions.',
      ),
    );
  }

  const title =
    coerceString(payload?.quiz_title) ??
    coerceString(payload?.title) ??
    `${request.topic.trim()} Quiz`;

  return collectQuestions(candidates, request.count, title);
}

function collectQuestions(
  candidates: Array<QuestionCandidate | null>,
  count: number,
  title: string,
): QuizParseResult {
  const questions: QuizQuestion[] = [];
  const rejected: RejectedQuestion[] = [];
  const seen = new Set<string>();

  candidates.forEach((candidate, index) => {
    if (!candidate) {
      rejected.push({ index, reason: 'not a question object' });
      return;
    }

    const checked = validateCandidate(candidate);
    if (typeof checked === 'string') {
      rejected.push({ index, reason: checked });
      return;
    }

    const key = normalize(checked.prompt);
    if (seen.has(key)) {
      rejected.push({ index, reason: 'duplicate question' });
      return;
    }
    seen.add(key);
    questions.push(checked);
  });

  if (questions.length < count) {
    return fail(
      new InsufficientQuestionsError(count, questions.length, rejected),
    );
  }

  return {
    ok: true,
    quiz: {
      title,
      questions: questions
        .slice(0, count)
        .map((question, index) => ({ ...question, id: index + 1 })),
      rejected,
    },
  };
}

/** Returns the question, or the reason it was rejected. */
function validateCandidate(candidate: QuestionCandidate): QuizQuestion | string {
  const prompt = candidate.prompt.replace(LEADING_NUMBER, '').trim();
  if (!prompt) {
    return 'missing question text';
  }

  const options = stripPositionalLabels(candidate.options);
  if (options.length < 2) {
    return 'fewer than two options';
  }
  if (new Set(options.map((option) => normalize(option.text))).size !== options.length) {
    return 'duplicate options';
  }

  if (candidate.answer === undefined || candidate.answer === null) {
    return 'missing correct answer';
  }
  const answerIndex = resolveAnswer(
    options,
    candidate.answer,
    candidate.zeroBasedAnswer,
  );
  if (answerIndex < 0) {
    return 'correct answer does not match any option';
  }

  const texts = options.map((option) => option.text);
  return {
    id: 0,
    prompt,
    options: texts,
    answer: texts[answerIndex],
    ...(candidate.explanation ? { explanation: candidate.explanation } : {}),
  };
}

function resolveAnswer(
  options: LabeledOption[],
  answer: unknown,
  zeroBased: boolean,
): number {
  if (typeof answer === 'number') {
    if (zeroBased) {
      return resolvePosition(options, answer);
    }
    const byText = findByText(options, String(answer));
    return byText >= 0 ? byText : resolvePosition(options, answer - 1);
  }
  if (typeof answer !== 'string') {
    return -1;
  }

  const value = answer.trim();
  const label = LABEL_ONLY.exec(value);
  if (label) {
    return findByLabel(options, label[1]);
  }

  const labeled = LABELED_TEXT.exec(value);
  if (labeled) {
    const index = findByLabel(options, labeled[1]);
    if (index >= 0 && normalize(options[index].text) === normalize(labeled[2])) {
      return index;
    }
  }

  // Numeric option text ("4" among 3/4/5/6) wins over a position.
  const byText = findByText(options, value);
  if (byText >= 0 || !/^\d+$/.test(value)) {
    return byText;
  }
  const position = Number(value);
  return resolvePosition(options, zeroBased ? position : position - 1);
}

function findByText(options: LabeledOption[], value: string): number {
  const wanted = normalize(value);
  return options.findIndex((option) => normalize(option.text) === wanted);
}

function resolvePosition(options: LabeledOption[], index: number): number {
  return Number.isInteger(index) && index >= 0 && index < options.length
    ? index
    : -1;
}

function findByLabel(options: LabeledOption[], label: string): number {
  const wanted = label.toUpperCase();
  return options.findIndex((option) => option.label === wanted);
}

/**
 * Array options sometimes arrive as `["A. x", "B. y"]`; the prefix is dropped
 * only when every option carries its own positional letter.
 */
function stripPositionalLabels(options: LabeledOption[]): LabeledOption[] {
  const stripped = options.map((option, index) => {
    const match = LABELED_TEXT.exec(option.text);
    return match && match[1].toUpperCase() === optionLetter(index)
      ? { label: option.label, text: match[2].trim() }
      : null;
  });

  return stripped.every((option): option is LabeledOption => option !== null)
    ? stripped
    : options;
}

function readJsonQuestion(value: unknown): QuestionCandidate | null {
  if (!isRecord(value)) {
    return null;
  }
  const raw: LlmQuizQuestionPayload = value;

  const answer = raw.correct_answer ?? raw.answer ?? raw.correctAnswer;
  const explanation = coerceString(raw.explanation);

  return {
    prompt:
      coerceString(raw.question) ??
      coerceString(raw.prompt) ??
      coerceString(raw.question_text) ??
      '',
    options: readJsonOptions(raw.options),
    answer: answer ?? raw.correctIndex,
    zeroBasedAnswer: answer === undefined && raw.correctIndex !== undefined,
    ...(explanation ? { explanation } : {}),
  };
}

function readJsonOptions(value: unknown): LabeledOption[] {
  if (Array.isArray(value)) {
    return value
      .map((option) => coerceOption(option))
      .filter((option): option is string => option !== null)
      .map((text, index) => ({ label: optionLetter(index), text }));
  }

  if (isRecord(value)) {
    return Object.entries(value).flatMap(([key, option]) => {
      const text = coerceOption(option);
      return text ? [{ label: key.trim().toUpperCase(), text }] : [];
    });
  }

  return [];
}

function tokenizeTextQuestions(text: string): QuestionCandidate[] {
  const candidates: QuestionCandidate[] = [];
  let current: QuestionCandidate | null = null;
  let section: 'prompt' | 'options' | 'answer' | 'explanation' = 'prompt';

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/\*\*/g, '').replace(/^#+\s*/, '').trim();
    if (!line || FENCE_LINE.test(line)) {
      continue;
    }

    const answer = ANSWER_LINE.exec(line);
    if (answer) {
      if (current) {
        current.answer = answer[1].trim();
        section = 'answer';
      }
      continue;
    }

    const explanation = EXPLANATION_LINE.exec(line);
    if (explanation) {
      if (current) {
        current.explanation = explanation[1].trim();
        section = 'explanation';
      }
      continue;
    }

    const question = QUESTION_LINE.exec(line);
    if (question) {
      current = {
        prompt: question[1].trim(),
        options: [],
        answer: undefined,
        zeroBasedAnswer: false,
      };
      candidates.push(current);
      section = 'prompt';
      continue;
    }

    if (!current) {
      continue;
    }

    const option = OPTION_LINE.exec(line);
    if (option && (section === 'prompt' || section === 'options')) {
      current.options.push({
        label: option[1].toUpperCase(),
        text: option[2].trim(),
      });
      section = 'options';
      continue;
    }

    if (section === 'prompt') {
      current.prompt = `${current.prompt} ${line}`;
    } else if (section === 'explanation') {
      current.explanation = `${current.explanation ?? ''} ${line}`.trim();
    }
  }

  return candidates;
}

function extractJsonPayload(text: string): LlmQuizPayload | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }

  return isLlmQuizPayload(parsed) ? parsed : null;
}

function isLlmQuizPayload(value: unknown): value is LlmQuizPayload {
  return isRecord(value) && Array.isArray(value.questions);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Drops a fence wrapped around the whole output; fences inside it stay. */
function stripCodeFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```[a-z]*[^\S\n]*\n?/i, '')
    .replace(/\n?```$/, '')
    .trim();
}

function coerceString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0
    ? value.trim()
    : null;
}

/** Models sometimes write numeric or boolean options without quotes. */
function coerceOption(value: unknown): string | null {
  if ((typeof value === 'number' && Number.isFinite(value)) || typeof value === 'boolean') {
    return String(value);
  }
  return coerceString(value);
}

function normalize(value: string): string {
  return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

function fail(error: QuizParseError): QuizParseResult {
  return { ok: false, error };
}
