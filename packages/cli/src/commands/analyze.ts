import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { SummaryLanguage, SummaryLength, Technicality } from '@repo-digest/shared';
import { submitAnalysis, getAnalysis, getApiUrl, setOwnerIdentity } from '../api';
import { waitForTerminalStatus } from '../poll';
import { htmlToText } from '../format';
import { LANGUAGES, LENGTHS, TECHNICALITIES, parsePositiveInt } from './options';

interface AnalyzeOptions {
  language?: SummaryLanguage;
  length?: SummaryLength;
  technicality?: Technicality;
  owner?: string;
  interval: number;
  timeout: number;
}

export const analyzeCommand = new Command('analyze')
  .description('Summarize a repository and wait for the result')
  .argument('<repo-url>', 'Repository URL')
  .addOption(new Option('-l, --language <code>', 'Summary language').choices(LANGUAGES))
  .addOption(new Option('--length <length>', 'Summary length').choices(LENGTHS))
  .addOption(new Option('-t, --technicality <level>', 'Target audience').choices(TECHNICALITIES))
  .option('-o, --owner <id>', 'Owner identity to submit as')
  .option('--interval <ms>', 'Polling interval in milliseconds', parsePositiveInt, 2000)
  .option('--timeout <ms>', 'Stop waiting after this many milliseconds', parsePositiveInt, 10 * 60 * 1000)
  .action(async (repoUrl: string, options: AnalyzeOptions) => {
    setOwnerIdentity(options.owner);
    const spinner = ora('Submitting repository...').start();

    try {
      const { id } = await submitAnalysis({
        repositoryReference: repoUrl,
        parameters: {
          language: options.language,
          length: options.length,
          technicality: options.technicality,
        },
      });
      spinner.text = `Job ${id} queued`;

      const job = await waitForTerminalStatus(() => getAnalysis(id), {
        intervalMs: options.interval,
        timeoutMs: options.timeout,
        onUpdate: (current) => {
          spinner.text = `Job ${id}: ${current.status}...`;
        },
      });

      if (job.status === 'failed') {
        spinner.fail(`Analysis failed for ${repoUrl}`);
        console.error(chalk.red(job.errorMessage || 'Unknown error'));
        console.log(chalk.gray(`Job ID: ${id}`));
        process.exit(1);
      }

      spinner.succeed(`Summary ready for ${repoUrl}`);
      console.log();
      console.log(htmlToText(job.summaryContent || ''));
      console.log();
      console.log(chalk.gray(`Job ID: ${id}`));
      console.log(chalk.gray(`API: ${getApiUrl()}`));
    } catch (error) {
      spinner.fail('Analysis failed');
      console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
      process.exit(1);
    }
  });
