import { Module } from '@nestjs/common';
import { ExportModule } from '../export/export.module';
import { QuizModule } from '../quiz/quiz.module';
import { WebController } from './web.controller';

@Module({
  imports: [QuizModule, ExportModule],
  controllers: [WebController],
})
export class WebModule {}
