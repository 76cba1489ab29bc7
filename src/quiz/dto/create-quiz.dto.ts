import { Transform } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import {
  QUIZ_DIFFICULTIES,
  QuizDifficulty,
} from '../types/quiz-question.interface';

export const QUIZ_COUNT_CHOICES = [5, 10, 20, 30, 50, 100] as const;
export const MAX_QUIZ_QUESTIONS = 100;

export class CreateQuizDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  topic!: string;

  @Transform(({ value }) => Number(value))
  @IsInt()
  @Min(1)
  @Max(MAX_QUIZ_QUESTIONS)
  count: number = 5;

  @Transform(({ value }) =>
    typeof value === 'string' ? value.trim().toLowerCase() : value,
  )
  @IsIn(QUIZ_DIFFICULTIES)
  difficulty: QuizDifficulty = 'medium';

  @IsOptional()
  @IsString()
  @MaxLength(60)
  name?: string;

  // Blank form fields arrive as '' and mean "not given".
  @Transform(({ obj }) =>
    obj.age === '' || obj.age === null || obj.age === undefined
      ? undefined
      : Number(obj.age),
  )
  @IsOptional()
  @IsInt()
  @Min(3)
  @Max(120)
  age?: number;
}
