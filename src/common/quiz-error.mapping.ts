import { HttpException, HttpStatus } from '@nestjs/common';
import { QuizApiError, QuizError } from '../quiz/quiz.errors';

export interface ErrorBody {
  statusCode: number;
  error: string;
  message: string;
}

export function statusForQuizError(error: QuizError): number {
  switch (error.kind) {
    case 'invalid-request':
      return HttpStatus.BAD_REQUEST;
    case 'api':
      return error instanceof QuizApiError && error.reason === 'timeout'
        ? HttpStatus.GATEWAY_TIMEOUT
        : HttpStatus.BAD_GATEWAY;
    case 'parse':
    case 'insufficient-questions':
      return HttpStatus.BAD_GATEWAY;
    case 'export':
      return HttpStatus.INTERNAL_SERVER_ERROR;
  }
}

/** Flattens any thrown value into the body sent to clients. */
export function toErrorBody(exception: unknown): ErrorBody {
  if (exception instanceof QuizError) {
    return {
      statusCode: statusForQuizError(exception),
      error: exception.kind,
      message: exception.message,
    };
  }

  if (exception instanceof HttpException) {
    const response = exception.getResponse();
    const message =
      typeof response === 'object' &&
      response !== null &&
      'message' in response
        ? response.message
        : exception.message;
    return {
      statusCode: exception.getStatus(),
      error: exception.name,
      message: Array.isArray(message) ? message.join('; ') : String(message),
    };
  }

  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    error: 'internal',
    message: 'Something went wrong. Please try again.',
  };
}
