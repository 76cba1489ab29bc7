import { Type } from 'class-transformer';
import { IsArray, IsInt, Min, ValidateNested } from 'class-validator';
import { QuizPayloadDto } from './quiz-payload.dto';

export class GradeQuizDto {
  @ValidateNested()
  @Type(() => QuizPayloadDto)
  quiz!: QuizPayloadDto;

  /** Zero-based option index per question, in question order. */
  @IsArray()
  @IsInt({ each: true })
  @Min(0, { each: true })
  selections!: number[];
}
