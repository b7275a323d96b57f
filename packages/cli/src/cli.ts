#!/usr/bin/env node
import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze';
import { statusCommand } from './commands/status';
import { historyCommand } from './commands/history';
import { DEFAULT_API_URL, setApiUrl } from './api';

const program = new Command();

program
  .name('digest')
  .description('CLI for Repo Digest - AI-written summaries of source repositories')
  .version('1.0.0')
  .option('--api-url <url>', 'API base URL', process.env.DIGEST_API_URL || DEFAULT_API_URL)
  .hook('preAction', () => {
    setApiUrl(program.opts<{ apiUrl: string }>().apiUrl);
  });

program.addCommand(analyzeCommand);
program.addCommand(statusCommand);
program.addCommand(historyCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
