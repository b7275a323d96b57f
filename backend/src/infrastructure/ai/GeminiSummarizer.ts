import { GenerateContentParameters, GoogleGenAI } from '@google/genai';
import { Logger } from '@nestjs/common';
import { SummarizerType } from '../../domain/ports/ISummarizer';
import { AnalysisError, describeError } from '../../domain/errors';
import { BaseSummarizer } from './BaseSummarizer';

/**
 * The part of a Gemini response the summarizer reads
 */
export interface GeminiResponse {
  text?: string;
  promptFeedback?: { blockReason?: string };
  candidates?: Array<{ finishReason?: string }>;
}

export type GenerateContent = (params: GenerateContentParameters) => Promise<GeminiResponse>;

export interface GeminiSummarizerOptions {
  apiKey?: string;
  model?: string;
}

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

/**
 * Gemini summarizer using the @google/genai SDK
 */
export class GeminiSummarizer extends BaseSummarizer {
  readonly name: SummarizerType = 'gemini';
  private readonly logger = new Logger(GeminiSummarizer.name);
  private readonly apiKey: string;
  private readonly model: string;
  private readonly generateContent: GenerateContent;
  private client: GoogleGenAI | null = null;

  constructor(options: GeminiSummarizerOptions = {}, generateContent?: GenerateContent) {
    super();
    this.apiKey = options.apiKey ?? process.env.GEMINI_API_KEY ?? '';
    this.model = options.model || process.env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL;
    this.generateContent = generateContent || ((params) => this.getClient().models.generateContent(params));
  }

  async isAvailable(): Promise<boolean> {
    return this.apiKey !== '';
  }

  protected async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    if (!this.apiKey) {
      throw new AnalysisError('GEMINI_API_KEY is not configured');
    }

    this.logger.debug(`Sending ${prompt.length} prompt chars to ${this.model}`);
    let response: GeminiResponse;
    try {
      response = await this.generateContent({
        model: this.model,
        contents: prompt,
        config: {
          temperature: 0.6,
          abortSignal: signal,
        },
      });
    } catch (error) {
      throw new AnalysisError(`Gemini request failed: ${describeError(error)}`);
    }

    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new AnalysisError(`Content generation blocked by safety filters: ${blockReason}`);
    }
    if (!response.text) {
      const finishReason = response.candidates?.[0]?.finishReason ?? 'UNKNOWN';
      throw new AnalysisError(`No summary content received from Gemini. Finish reason: ${finishReason}`);
    }
    return response.text;
  }

  // Created on first use: the SDK refuses to construct without a key
  private getClient(): GoogleGenAI {
    if (!this.client) {
      this.client = new GoogleGenAI({ apiKey: this.apiKey });
    }
    return this.client;
  }
}
