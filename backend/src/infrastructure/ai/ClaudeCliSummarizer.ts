import { Logger } from '@nestjs/common';
import { CommandResult, ICommandRunner } from '../../domain/ports/ICommandRunner';
import { SummarizerType } from '../../domain/ports/ISummarizer';
import { AnalysisError, describeError } from '../../domain/errors';
import { BaseSummarizer } from './BaseSummarizer';

export interface ClaudeCliSummarizerOptions {
  binary?: string;
  model?: string;
  timeoutMs?: number;
}

/**
 * Claude summarizer using the Claude CLI in print mode.
 * No tools are enabled: the CLI only reads the prompt from stdin and answers.
 */
export class ClaudeCliSummarizer extends BaseSummarizer {
  readonly name: SummarizerType = 'claude';
  private readonly logger = new Logger(ClaudeCliSummarizer.name);
  private readonly binary: string;
  private readonly model: string | undefined;
  private readonly timeoutMs: number | undefined;

  constructor(
    private readonly runner: ICommandRunner,
    options: ClaudeCliSummarizerOptions = {},
  ) {
    super();
    this.binary = options.binary || 'claude';
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner.execute(this.binary, ['--version'], { timeoutMs: 10000 });
      return result.exitCode === 0;
    } catch (error) {
      this.logger.debug(`Claude CLI unavailable: ${describeError(error)}`);
      return false;
    }
  }

  protected async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const args = ['-p', '--output-format', 'text'];
    if (this.model) {
      args.push('--model', this.model);
    }

    let result: CommandResult;
    try {
      // Prompt goes through stdin to avoid command line length limits
      result = await this.runner.execute(this.binary, args, { input: prompt, timeoutMs: this.timeoutMs, signal });
    } catch (error) {
      throw new AnalysisError(`Claude CLI failed: ${describeError(error)}`);
    }

    if (result.exitCode !== 0) {
      throw new AnalysisError(`Claude CLI failed with code ${result.exitCode}: ${result.stderr.trim().slice(0, 500)}`);
    }
    return result.stdout;
  }
}
