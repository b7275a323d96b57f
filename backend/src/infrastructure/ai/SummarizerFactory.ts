import { ISummarizer, SummarizerType } from '../../domain/ports/ISummarizer';
import { ISummarizerFactory } from '../../domain/ports/ISummarizerFactory';

/**
 * Registry of summarizer instances by type
 * Implements ISummarizerFactory port from domain
 */
export class SummarizerFactory implements ISummarizerFactory {
  private summarizers: Map<SummarizerType, ISummarizer> = new Map();

  constructor(summarizers: ISummarizer[]) {
    for (const summarizer of summarizers) {
      this.summarizers.set(summarizer.name, summarizer);
    }
  }

  getSummarizer(type: SummarizerType): ISummarizer {
    const summarizer = this.summarizers.get(type);
    if (!summarizer) {
      throw new Error(`Unknown summarizer: ${type}`);
    }
    return summarizer;
  }

  async getAvailableSummarizers(): Promise<SummarizerType[]> {
    const available: SummarizerType[] = [];

    for (const [type, summarizer] of this.summarizers) {
      if (await summarizer.isAvailable()) {
        available.push(type);
      }
    }

    return available;
  }
}
