export type QuizErrorKind =
  | 'invalid-request'
  | 'api'
  | 'parse'
  | 'insufficient-questions'
  | 'export';

export abstract class QuizError extends Error {
  abstract readonly kind: QuizErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidQuizRequestError extends QuizError {
  readonly kind = 'invalid-request';
}

export type QuizApiFailure =
  | 'timeout'
  | 'network'
  | 'status'
  | 'cancelled'
  | 'empty';

export class QuizApiError extends QuizError {
  readonly kind = 'api';

  constructor(
    readonly reason: QuizApiFailure,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type QuizParseFailure = 'empty' | 'malformed';

export interface RejectedQuestion {
  index: number;
  reason: string;
}

export class QuizParseError extends QuizError {
  readonly kind: 'parse' | 'insufficient-questions' = 'parse';

  constructor(
    readonly reason: QuizParseFailure | 'insufficient',
    message: string,
    readonly rejected: RejectedQuestion[] = [],
  ) {
    super(message);
  }
}

export class InsufficientQuestionsError extends QuizParseError {
  override readonly kind = 'insufficient-questions';

  constructor(
    readonly requested: number,
    readonly recovered: number,
    rejected: RejectedQuestion[] = [],
  ) {
    super(
      'insufficient',
      `The model returned ${recovered} usable question(s) but ${requested} were requested. Please try again.`,
      rejected,
    );
  }
}

export class QuizExportError extends QuizError {
  readonly kind = 'export';
}

export class ConfigurationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n - ${problems.join('\n - ')}`);
    this.name = 'ConfigurationError';
  }
}
