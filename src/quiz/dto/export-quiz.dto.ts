import { Type } from 'class-transformer';
import { IsBoolean, IsOptional, ValidateNested } from 'class-validator';
import { QuizPayloadDto } from './quiz-payload.dto';

export class ExportQuizDto {
  @ValidateNested()
  @Type(() => QuizPayloadDto)
  quiz!: QuizPayloadDto;

  @IsOptional()
  @IsBoolean()
  includeAnswers?: boolean;
}
