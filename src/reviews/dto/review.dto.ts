import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { MAX_SCORE, MIN_SCORE } from '../../database/entities/review.entity';

export class CreateReviewDto {
  @IsString()
  text!: string;

  @Type(() => Number)
  @IsInt()
  @Min(MIN_SCORE)
  @Max(MAX_SCORE)
  score!: number;
}

export class UpdateReviewDto {
  @IsOptional()
  @IsString()
  text?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(MIN_SCORE)
  @Max(MAX_SCORE)
  score?: number;
}
