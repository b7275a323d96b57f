import { ISummarizer, SummarizerType } from '../../domain/ports/ISummarizer';
import { SummarizerFactory } from './SummarizerFactory';

class StubSummarizer implements ISummarizer {
  constructor(
    readonly name: SummarizerType,
    private readonly available: boolean,
  ) {}

  async summarize(): Promise<string> {
    return `<p>${this.name}</p>`;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }
}

describe('SummarizerFactory', () => {
  const gemini = new StubSummarizer('gemini', true);
  const claude = new StubSummarizer('claude', false);
  const factory = new SummarizerFactory([gemini, claude]);

  it('should return the summarizer registered for a type', () => {
    expect(factory.getSummarizer('claude')).toBe(claude);
  });

  it('should list only available summarizers', async () => {
    await expect(factory.getAvailableSummarizers()).resolves.toEqual(['gemini']);
  });

  it('should reject an unregistered type', () => {
    expect(() => new SummarizerFactory([gemini]).getSummarizer('claude')).toThrow('Unknown summarizer: claude');
  });
});
