import { INestApplication, ValidationPipe } from '@nestjs/common';
import type { QuizConfig } from './config/quiz.config';

export function configureApp(app: INestApplication, config: QuizConfig): void {
  app.enableCors({
    origin: [...config.allowedOrigins],
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );
}
