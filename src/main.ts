import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { QUIZ_CONFIG, QuizConfig } from './config/quiz.config';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(logger);

  const config = app.get<QuizConfig>(QUIZ_CONFIG);
  configureApp(app, config);

  await app.listen(config.port);

  logger.log(
    `🚀 Quiz app running on ${
      config.isProduction ? 'production' : 'local'
    } port ${config.port}`,
  );
}
bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  const stack =
    error instanceof Error ? (error.stack ?? error.message) : String(error);
  logger.error('Failed to bootstrap application', stack);
  process.exit(1);
});
