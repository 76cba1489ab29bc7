import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsIn,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  QUIZ_DIFFICULTIES,
  QuizDifficulty,
  QuizQuestion,
  QuizResponse,
} from '../types/quiz-question.interface';

export class QuizQuestionDto implements QuizQuestion {
  @IsInt()
  @Min(1)
  id!: number;

  @IsString()
  @IsNotEmpty()
  prompt!: string;

  @IsArray()
  @ArrayMinSize(2)
  @IsString({ each: true })
  options!: string[];

  @IsString()
  @IsNotEmpty()
  answer!: string;

  @IsOptional()
  @IsString()
  explanation?: string;
}

/** A quiz sent back by a client, for grading or export. */
export class QuizPayloadDto implements QuizResponse {
  @IsString()
  @IsNotEmpty()
  topic!: string;

  @IsIn(QUIZ_DIFFICULTIES)
  difficulty!: QuizDifficulty;

  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsInt()
  @Min(1)
  count!: number;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => QuizQuestionDto)
  questions!: QuizQuestionDto[];

  @IsISO8601()
  generatedAt!: string;
}
