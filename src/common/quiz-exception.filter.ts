import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { QuizError } from '../quiz/quiz.errors';
import { toErrorBody } from './quiz-error.mapping';

@Catch(QuizError)
export class QuizExceptionFilter implements ExceptionFilter<QuizError> {
  private readonly logger = new Logger(QuizExceptionFilter.name);

  catch(exception: QuizError, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const body = toErrorBody(exception);
    this.logger.warn(`${body.statusCode} ${exception.name}: ${body.message}`);

    if (res.headersSent || res.destroyed) {
      return;
    }
    res.status(body.statusCode).json(body);
  }
}
