import chalk from 'chalk';
import ora from 'ora';

import { config, resolveGitHubToken, validateConfig } from './config.js';
import { formatError } from './errors.js';
import { GitHubClient } from './github-client.js';
import { GitOperations } from './git-ops.js';
import { fetchPrCommentsMarkdown, type CommentSource } from './pr-comments.js';
import {
  formatRef,
  gitRemoteDetector,
  resolveReference,
  type ReferenceSource,
} from './reference.js';
import type { RepositorySlug } from './types.js';

export interface CliOptions {
  repo?: string;
  includeResolved?: boolean;
}

export interface CliContext {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  signal?: AbortSignal;
  detectRepository?: () => Promise<RepositorySlug>;
  createSource?: (warn: (message: string) => void) => CommentSource;
}

const SOURCE_LABELS: Record<ReferenceSource, string> = {
  url: 'URL',
  short: 'short form',
  'repo-option': '--repo',
  'git-remote': 'git remote origin',
};

function createGitHubSource(signal: AbortSignal | undefined, warn: (message: string) => void) {
  const client = new GitHubClient({
    token: resolveGitHubToken(),
    baseUrl: config.githubApiUrl,
    maxRetries: config.maxRetries,
    signal,
  });
  if (!client.canReadThreadStates) {
    warn('No GitHub token found: resolved threads cannot be detected and are shown as unresolved');
  }
  return client;
}

/**
 * Resolve, fetch and render one pull request. Only the finished document is
 * written to stdout; progress, warnings and the error line go to stderr.
 * Returns the process exit code.
 */
export async function runPrComments(
  pr: string,
  options: CliOptions,
  context: CliContext
): Promise<number> {
  const { stdout, stderr } = context;
  const warn = (message: string) => stderr.write(`${chalk.yellow(message)}\n`);
  const spinner = ora({ text: 'Resolving pull request...', stream: stderr });

  try {
    validateConfig();

    const resolved = await resolveReference(pr, {
      repo: options.repo,
      detectRepository:
        context.detectRepository ?? gitRemoteDetector(new GitOperations('.'), config.githubHost),
    });
    if (resolved.ignoredRepo) {
      warn(
        `Ignoring --repo ${resolved.ignoredRepo}: the reference already names ${resolved.ref.owner}/${resolved.ref.repo}`
      );
    }

    const source = context.createSource
      ? context.createSource(warn)
      : createGitHubSource(context.signal, warn);

    stderr.write(`${chalk.dim(`Using ${formatRef(resolved.ref)} (from ${SOURCE_LABELS[resolved.source]})`)}\n`);
    spinner.start(`Fetching comments for ${formatRef(resolved.ref)}...`);
    const result = await fetchPrCommentsMarkdown(source, resolved.ref, {
      includeResolved: options.includeResolved,
    });
    const hidden = result.hiddenThreads > 0 ? `, ${result.hiddenThreads} resolved thread(s) hidden` : '';
    spinner.succeed(`Fetched ${result.commentCount} comment(s)${hidden}`);

    stdout.write(result.markdown);
    return 0;
  } catch (e) {
    spinner.stop();
    stderr.write(`${chalk.red(`Error: ${formatError(e)}`)}\n`);
    return 1;
  }
}
