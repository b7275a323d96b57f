// Summary parameter enums
export type SummaryLanguage = 'en' | 'es' | 'fr' | 'de' | 'it' | 'pt' | 'nl' | 'ja' | 'zh' | 'ko' | 'ru';
export type SummaryLength = 'short' | 'medium' | 'long';
export type Technicality = 'beginner' | 'intermediate' | 'expert';

export interface SummaryParametersDto {
  language: SummaryLanguage;
  length: SummaryLength;
  technicality: Technicality;
}

// Analysis DTOs
export type AnalysisStatus = 'queued' | 'processing' | 'analyzing' | 'completed' | 'failed';

export interface SubmitAnalysisRequest {
  repositoryReference: string;
  parameters?: Partial<SummaryParametersDto>;
}

export interface SubmitAnalysisResponse {
  id: string;
  status: AnalysisStatus;
}

export interface AnalysisJobDto {
  id: string;
  status: AnalysisStatus;
  repositoryReference: string;
  parameters: SummaryParametersDto;
  summaryContent: string | null;
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface HistoryListDto {
  items: AnalysisJobDto[];
  /** Every job of the owner, while items stops at the history limit */
  total: number;
}

// Health
export interface QueueHealthDto {
  depth: number;
  deadLetters: number;
}

export interface HealthDto {
  status: 'ok';
  queues: Record<string, QueueHealthDto>;
  jobs: Record<AnalysisStatus, number>;
}

// Error body returned by the API
export interface ApiErrorDto {
  statusCode: number;
  message: string | string[];
  error?: string;
}
