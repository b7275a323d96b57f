/**
 * Port for AI summarization providers
 * Infrastructure provides the adapter implementations (Gemini, Claude CLI)
 */

import { SummaryParametersValue } from '../value-objects/SummaryParameters';

export type SummarizerType = 'gemini' | 'claude';

export interface ISummarizer {
  readonly name: SummarizerType;

  /**
   * Summarize extracted repository content. The signal is aborted when the
   * caller gives up waiting.
   */
  summarize(content: string, parameters: SummaryParametersValue, signal?: AbortSignal): Promise<string>;

  /**
   * Check if the provider is usable (API key configured, CLI installed, etc.)
   */
  isAvailable(): Promise<boolean>;
}

export const SUMMARIZER = Symbol('ISummarizer');
