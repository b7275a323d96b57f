import { IsIn, IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import type {
  SubmitAnalysisRequest,
  SummaryLanguage,
  SummaryLength,
  SummaryParametersDto,
  Technicality,
} from '@repo-digest/shared';
import { SUMMARY_LANGUAGES, SUMMARY_LENGTHS, TECHNICALITY_LEVELS } from '../../../domain';

// Request DTOs with validation (stay in backend)
export class SummaryParametersInputDto implements Partial<SummaryParametersDto> {
  @IsIn(SUMMARY_LANGUAGES)
  @IsOptional()
  language?: SummaryLanguage;

  @IsIn(SUMMARY_LENGTHS)
  @IsOptional()
  length?: SummaryLength;

  @IsIn(TECHNICALITY_LEVELS)
  @IsOptional()
  technicality?: Technicality;
}

export class SubmitAnalysisDto implements SubmitAnalysisRequest {
  @IsString()
  @IsNotEmpty()
  repositoryReference!: string;

  @ValidateNested()
  @Type(() => SummaryParametersInputDto)
  @IsOptional()
  parameters?: SummaryParametersInputDto;
}

// Re-export response types from shared
export type {
  SubmitAnalysisResponse,
  AnalysisJobDto as AnalysisJobResponseDto,
  HistoryListDto as HistoryListResponseDto,
  HealthDto as HealthResponseDto,
} from '@repo-digest/shared';
