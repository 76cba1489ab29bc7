import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { toErrorBody } from '../common/quiz-error.mapping';
import { ErrorPage } from './views/ErrorPage';
import { renderPage } from './views/render';

/** Renders every failure on the web pages as an HTML error page. */
@Catch()
export class HtmlErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(HtmlErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const body = toErrorBody(exception);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const stack =
        exception instanceof Error
          ? (exception.stack ?? exception.message)
          : String(exception);
      this.logger.error(`${body.statusCode} ${body.error}`, stack);
    } else {
      this.logger.warn(`${body.statusCode} ${body.error}: ${body.message}`);
    }

    if (res.headersSent || res.destroyed) {
      return;
    }
    res
      .status(body.statusCode)
      .type('html')
      .send(
        renderPage(
          ErrorPage({ statusCode: body.statusCode, message: body.message }),
        ),
      );
  }
}
