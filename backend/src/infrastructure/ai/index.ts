export { BaseSummarizer, stripCodeFences } from './BaseSummarizer';
export { GeminiSummarizer, GeminiSummarizerOptions, GenerateContent, DEFAULT_GEMINI_MODEL } from './GeminiSummarizer';
export { ClaudeCliSummarizer, ClaudeCliSummarizerOptions } from './ClaudeCliSummarizer';
export { SummarizerFactory } from './SummarizerFactory';
