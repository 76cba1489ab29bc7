import { Module } from '@nestjs/common';
import { QuizPdfService } from './quiz-pdf.service';

@Module({
  providers: [QuizPdfService],
  exports: [QuizPdfService],
})
export class ExportModule {}
