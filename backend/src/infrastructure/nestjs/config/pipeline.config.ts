import { registerAs } from '@nestjs/config';
import { tmpdir } from 'os';
import { join } from 'path';
import { SummarizerType } from '../../../domain/ports/ISummarizer';

export const PIPELINE_STAGES = ['repo-processing', 'ai-analysis', 'results'] as const;
export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export const SUMMARIZER_TYPES = ['gemini', 'claude'] as const satisfies readonly SummarizerType[];

export interface PipelineConfig {
  port: number;
  databasePath: string;
  historyLimit: number;
  stages: PipelineStage[];
  pollIntervalMs: number;
  concurrency: number;
  visibilityTimeoutMs: number;
  maxDeliveryAttempts: number;
  fetchTimeoutMs: number;
  maxRepositorySizeKb: number;
  maxSourceFiles: number;
  maxExtractedChars: number;
  analysisTimeoutMs: number;
  cloneDir: string;
  githubToken: string;
  summarizer: SummarizerType;
  geminiApiKey: string;
  geminiModel: string | undefined;
  claudeModel: string | undefined;
}

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : fallback;
}

/**
 * Unset means every stage; an empty string disables in-process workers
 */
export function parseStages(value: string | undefined): PipelineStage[] {
  if (value === undefined) {
    return [...PIPELINE_STAGES];
  }

  const stages: PipelineStage[] = [];
  for (const entry of value.split(',').map((part) => part.trim()).filter(Boolean)) {
    const stage = PIPELINE_STAGES.find((candidate) => candidate === entry);
    if (!stage) {
      throw new Error(`Unknown pipeline stage "${entry}". Expected one of: ${PIPELINE_STAGES.join(', ')}`);
    }
    if (!stages.includes(stage)) {
      stages.push(stage);
    }
  }
  return stages;
}

export function parseSummarizer(value: string | undefined): SummarizerType {
  if (!value) {
    return 'gemini';
  }
  const type = SUMMARIZER_TYPES.find((candidate) => candidate === value);
  if (!type) {
    throw new Error(`Unknown summarizer "${value}". Expected one of: ${SUMMARIZER_TYPES.join(', ')}`);
  }
  return type;
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return {
    port: readInt(env.PORT, 3000),
    databasePath: env.DATABASE_PATH || join(process.cwd(), 'data', 'repo-digest.db'),
    historyLimit: readInt(env.HISTORY_LIMIT, 50),
    stages: parseStages(env.PIPELINE_STAGES),
    pollIntervalMs: readInt(env.WORKER_POLL_INTERVAL_MS, 1000),
    concurrency: readInt(env.WORKER_CONCURRENCY, 1),
    visibilityTimeoutMs: readInt(env.VISIBILITY_TIMEOUT_MS, 600000),
    maxDeliveryAttempts: readInt(env.MAX_DELIVERY_ATTEMPTS, 5),
    fetchTimeoutMs: readInt(env.FETCH_TIMEOUT_MS, 120000),
    maxRepositorySizeKb: readInt(env.MAX_REPOSITORY_SIZE_KB, 512000),
    maxSourceFiles: readInt(env.MAX_SOURCE_FILES, 150),
    maxExtractedChars: readInt(env.MAX_EXTRACTED_CHARS, 400000),
    analysisTimeoutMs: readInt(env.ANALYSIS_TIMEOUT_MS, 180000),
    cloneDir: env.CLONE_DIR || join(tmpdir(), 'repo-digest'),
    githubToken: env.GITHUB_TOKEN || '',
    summarizer: parseSummarizer(env.SUMMARIZER),
    geminiApiKey: env.GEMINI_API_KEY || '',
    geminiModel: env.GEMINI_MODEL || undefined,
    claudeModel: env.CLAUDE_MODEL || undefined,
  };
}

export const pipelineConfig = registerAs('pipeline', (): PipelineConfig => loadPipelineConfig());
