import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { QuizExceptionFilter } from './common/quiz-exception.filter';
import { validateEnvironment } from './config/environment';
import { QuizModule } from './quiz/quiz.module';
import { WebModule } from './web/web.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      ignoreEnvFile: process.env.NODE_ENV === 'test',
      validate: validateEnvironment,
    }),
    QuizModule,
    WebModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: QuizExceptionFilter }],
})
export class AppModule {}
