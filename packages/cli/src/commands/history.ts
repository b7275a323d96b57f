import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import { listHistory, setOwnerIdentity } from '../api';
import { getStatusColor, truncate } from '../format';

export const historyCommand = new Command('history')
  .description('List the analyses submitted by an owner, newest first')
  .requiredOption('-o, --owner <id>', 'Owner identity')
  .action(async (options: { owner: string }) => {
    setOwnerIdentity(options.owner);
    const spinner = ora('Fetching history...').start();

    try {
      const { items, total } = await listHistory();
      spinner.succeed(`Found ${total} analyses`);

      if (items.length === 0) {
        console.log(chalk.yellow('No analyses yet. Use `digest analyze <repo-url> --owner <id>` to start one.'));
        return;
      }

      const table = new Table({
        head: [chalk.cyan('ID'), chalk.cyan('Repository'), chalk.cyan('Status'), chalk.cyan('Created')],
        colWidths: [40, 40, 12, 24],
      });

      for (const job of items) {
        table.push([
          job.id,
          truncate(job.repositoryReference, 38),
          getStatusColor(job.status)(job.status),
          new Date(job.createdAt).toLocaleString(),
        ]);
      }

      console.log(table.toString());
      if (items.length < total) {
        console.log(chalk.gray(`Showing the newest ${items.length} of ${total}`));
      }
      console.log();
      console.log(chalk.gray('Use `digest status <job-id>` for the full summary'));
    } catch (error) {
      spinner.fail('Failed to fetch history');
      console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
      process.exit(1);
    }
  });
