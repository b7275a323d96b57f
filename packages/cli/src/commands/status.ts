import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getAnalysis, setOwnerIdentity } from '../api';
import { getStatusColor, htmlToText } from '../format';

export const statusCommand = new Command('status')
  .description('Show the current state of an analysis job')
  .argument('<job-id>', 'Job ID returned by `digest analyze`')
  .option('-o, --owner <id>', 'Owner identity to read as')
  .action(async (jobId: string, options: { owner?: string }) => {
    setOwnerIdentity(options.owner);
    const spinner = ora('Fetching job status...').start();

    try {
      const job = await getAnalysis(jobId);
      spinner.succeed('Job found');

      console.log();
      console.log(chalk.bold('Job Details'));
      console.log(chalk.gray('─'.repeat(50)));
      console.log(`  ID:           ${job.id}`);
      console.log(`  Repository:   ${job.repositoryReference}`);
      console.log(`  Status:       ${getStatusColor(job.status)(job.status)}`);
      console.log(`  Language:     ${job.parameters.language}`);
      console.log(`  Length:       ${job.parameters.length}`);
      console.log(`  Technicality: ${job.parameters.technicality}`);
      console.log(`  Created:      ${new Date(job.createdAt).toLocaleString()}`);
      console.log(`  Updated:      ${new Date(job.updatedAt).toLocaleString()}`);

      if (job.summaryContent) {
        console.log();
        console.log(chalk.green.bold('Summary:'));
        console.log(htmlToText(job.summaryContent));
      }

      if (job.errorMessage) {
        console.log();
        console.log(chalk.red.bold('Error:'));
        console.log(`  ${job.errorMessage}`);
      }
    } catch (error) {
      spinner.fail('Failed to fetch job status');
      console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
      process.exit(1);
    }
  });
