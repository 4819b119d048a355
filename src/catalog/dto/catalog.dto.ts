import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  MinLength,
  ValidateIf,
} from 'class-validator';
import { PaginationQueryDto } from '../../common/pagination';
import {
  NAME_MAX_LENGTH,
  SLUG_MAX_LENGTH,
} from '../../database/entities/category.entity';
import { SLUG_PATTERN } from '../catalog-rules';

export class CreateSlugEntryDto {
  @IsString()
  @MinLength(1)
  @MaxLength(NAME_MAX_LENGTH)
  name!: string;

  @IsString()
  @MaxLength(SLUG_MAX_LENGTH)
  @Matches(SLUG_PATTERN)
  slug!: string;
}

export class UpdateSlugEntryDto {
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(NAME_MAX_LENGTH)
  name?: string;

  @IsOptional()
  @IsString()
  @MaxLength(SLUG_MAX_LENGTH)
  @Matches(SLUG_PATTERN)
  slug?: string;
}

export class SearchQueryDto extends PaginationQueryDto {
  @IsOptional()
  @IsString()
  search?: string;
}

export class CreateTitleDto {
  @IsString()
  @MinLength(1)
  @MaxLength(NAME_MAX_LENGTH)
  name!: string;

  @Type(() => Number)
  @IsInt()
  year!: number;

  @IsOptional()
  @IsString()
  description?: string | null;

  @ValidateIf((_dto, value) => value !== null && value !== undefined)
  @IsString()
  category?: string | null;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  genres!: string[];
}

export class UpdateTitleDto {
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(NAME_MAX_LENGTH)
  name?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  year?: number;

  @IsOptional()
  @IsString()
  description?: string | null;

  @ValidateIf((_dto, value) => value !== null && value !== undefined)
  @IsString()
  category?: string | null;

  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  genres?: string[];
}

export class TitleQueryDto extends PaginationQueryDto {
  @IsOptional()
  @IsString()
  category?: string;

  @IsOptional()
  @IsString()
  genre?: string;

  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  year?: number;
}
