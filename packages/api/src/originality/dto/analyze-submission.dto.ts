import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsDateString,
  IsIn,
  IsOptional,
  IsString,
  MaxLength,
  MinLength,
  ValidateNested,
} from 'class-validator';

import { ContentKind } from '../originality.types';

const CONTENT_KINDS: ContentKind[] = ['code', 'natural_language', 'unknown'];

export class SubmissionFileDto {
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  file_name!: string;

  @IsString()
  @MaxLength(2_000_000)
  text!: string;

  @IsOptional()
  @IsIn(CONTENT_KINDS)
  content_kind?: ContentKind;
}

export class AnalyzeSubmissionDto {
  @IsString()
  @MinLength(1)
  @MaxLength(128)
  submission_id!: string;

  @IsString()
  @MinLength(1)
  @MaxLength(128)
  author_id!: string;

  @IsOptional()
  @IsDateString()
  created_at?: string;

  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(200)
  @ValidateNested({ each: true })
  @Type(() => SubmissionFileDto)
  files!: SubmissionFileDto[];
}
