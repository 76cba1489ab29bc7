import { Module } from '@nestjs/common';
import { quizConfigProvider } from '../config/quiz.config';
import { ExportModule } from '../export/export.module';
import { OpenAiQuizLlmClient } from './llm/openai-quiz-llm.client';
import { QUIZ_LLM_CLIENT } from './llm/quiz-llm.client';
import { QuizController } from './quiz.controller';
import { QuizService } from './quiz.service';

@Module({
  imports: [ExportModule],
  controllers: [QuizController],
  providers: [
    quizConfigProvider,
    QuizService,
    { provide: QUIZ_LLM_CLIENT, useClass: OpenAiQuizLlmClient },
  ],
  exports: [QuizService],
})
export class QuizModule {}
