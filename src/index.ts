#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';

import { runPrComments, type CliOptions } from './cli.js';

const program = new Command();
const controller = new AbortController();

process.once('SIGINT', () => {
  controller.abort();
  console.error(chalk.yellow('\nInterrupted'));
  process.exit(130);
});

program
  .name('pr-comments')
  .description('Render GitHub pull request comments as markdown')
  .version('1.0.0')
  .argument('<pr>', "PR number, PR URL, or 'owner/repo#number'")
  .option('-r, --repo <owner/name>', 'GitHub repository (defaults to the git remote origin)')
  .option('--include-resolved', 'Include resolved review threads (detecting them needs a GitHub token)')
  .showHelpAfterError(true)
  .action(async (pr: string, options: CliOptions) => {
    process.exitCode = await runPrComments(pr, options, {
      stdout: process.stdout,
      stderr: process.stderr,
      signal: controller.signal,
    });
  });

await program.parseAsync();
