import { ISummarizer, SummarizerType } from './ISummarizer';

export interface ISummarizerFactory {
  getSummarizer(type: SummarizerType): ISummarizer;
  getAvailableSummarizers(): Promise<SummarizerType[]>;
}

export const SUMMARIZER_FACTORY = Symbol('ISummarizerFactory');
