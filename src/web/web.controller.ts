import {
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  Post,
  Res,
  StreamableFile,
  UseFilters,
} from '@nestjs/common';
import type { Response } from 'express';
import { abortOnDisconnect } from '../common/abort-on-disconnect';
import { QuizPdfService } from '../export/quiz-pdf.service';
import { CreateQuizDto } from '../quiz/dto/create-quiz.dto';
import { QuizService } from '../quiz/quiz.service';
import { HtmlErrorFilter } from './html-error.filter';
import {
  QuizForm,
  readCheckbox,
  readQuizField,
  readSelections,
} from './quiz-form';
import { HomePage } from './views/HomePage';
import { PlayPage } from './views/PlayPage';
import { ResultsPage } from './views/ResultsPage';
import { renderPage } from './views/render';

const HTML = 'text/html; charset=utf-8';

@Controller()
@UseFilters(HtmlErrorFilter)
export class WebController {
  constructor(
    private readonly quizService: QuizService,
    private readonly quizPdfService: QuizPdfService,
  ) {}

  @Get()
  @Header('Content-Type', HTML)
  home(): string {
    return renderPage(HomePage());
  }

  @Post('play')
  @HttpCode(200)
  @Header('Content-Type', HTML)
  async play(
    @Body() dto: CreateQuizDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<string> {
    const disconnect = abortOnDisconnect(res);
    try {
      const quiz = await this.quizService.generateQuiz(dto, disconnect.signal);
      return renderPage(PlayPage({ quiz }));
    } finally {
      disconnect.release();
    }
  }

  @Post('results')
  @HttpCode(200)
  @Header('Content-Type', HTML)
  async results(@Body() form: QuizForm): Promise<string> {
    const quiz = await readQuizField(form);
    const selections = readSelections(form, quiz);

    if (selections.some((selection) => selection === undefined)) {
      return renderPage(
        PlayPage({ quiz, selections, notice: 'Please answer all questions.' }),
      );
    }

    const grade = this.quizService.gradeQuiz(quiz, selections);
    return renderPage(ResultsPage({ quiz, grade }));
  }

  @Post('retake')
  @HttpCode(200)
  @Header('Content-Type', HTML)
  async retake(@Body() form: QuizForm): Promise<string> {
    const quiz = await readQuizField(form);
    return renderPage(PlayPage({ quiz }));
  }

  @Post('download')
  @HttpCode(200)
  async download(@Body() form: QuizForm): Promise<StreamableFile> {
    const quiz = await readQuizField(form);
    const pdf = this.quizPdfService.render(quiz, {
      includeAnswers: readCheckbox(form, 'includeAnswers'),
    });
    return new StreamableFile(pdf, {
      type: 'application/pdf',
      disposition: `attachment; filename="${this.quizPdfService.fileName(quiz)}"`,
    });
  }
}
