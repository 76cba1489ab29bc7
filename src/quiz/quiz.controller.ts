import {
  Body,
  Controller,
  HttpCode,
  Post,
  Res,
  StreamableFile,
} from '@nestjs/common';
import type { Response } from 'express';
import { abortOnDisconnect } from '../common/abort-on-disconnect';
import { QuizPdfService } from '../export/quiz-pdf.service';
import { CreateQuizDto } from './dto/create-quiz.dto';
import { ExportQuizDto } from './dto/export-quiz.dto';
import { GradeQuizDto } from './dto/grade-quiz.dto';
import { QuizService } from './quiz.service';
import type {
  QuizGrade,
  QuizResponse,
} from './types/quiz-question.interface';

@Controller('quiz')
export class QuizController {
  constructor(
    private readonly quizService: QuizService,
    private readonly quizPdfService: QuizPdfService,
  ) {}

  @Post()
  async generateQuiz(
    @Body() createQuizDto: CreateQuizDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<QuizResponse> {
    const disconnect = abortOnDisconnect(res);
    try {
      return await this.quizService.generateQuiz(
        createQuizDto,
        disconnect.signal,
      );
    } finally {
      disconnect.release();
    }
  }

  @Post('grade')
  @HttpCode(200)
  gradeQuiz(@Body() gradeQuizDto: GradeQuizDto): QuizGrade {
    return this.quizService.gradeQuiz(
      gradeQuizDto.quiz,
      gradeQuizDto.selections,
    );
  }

  @Post('pdf')
  @HttpCode(200)
  exportPdf(@Body() exportQuizDto: ExportQuizDto): StreamableFile {
    const { quiz, includeAnswers } = exportQuizDto;
    const pdf = this.quizPdfService.render(quiz, { includeAnswers });
    return new StreamableFile(pdf, {
      type: 'application/pdf',
      disposition: `attachment; filename="${this.quizPdfService.fileName(quiz)}"`,
    });
  }
}
