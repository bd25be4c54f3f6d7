import 'dotenv/config';
import { execFileSync } from 'child_process';

const DEFAULT_MAX_RETRIES = 3;

export const config = {
  // GitHub
  githubToken: process.env.GITHUB_TOKEN || process.env.GH_TOKEN || '',
  githubApiUrl: process.env.GITHUB_API_URL || 'https://api.github.com',
  githubHost: process.env.GITHUB_HOST || 'github.com',

  // Retries for 5xx and network failures
  maxRetries: parseRetries(process.env.PR_COMMENTS_MAX_RETRIES),
};

function parseRetries(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_MAX_RETRIES;
  }
  return Number(value);
}

export function validateConfig(): void {
  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
    throw new Error(
      `PR_COMMENTS_MAX_RETRIES must be a non-negative integer, got "${process.env.PR_COMMENTS_MAX_RETRIES}"`
    );
  }

  try {
    new URL(config.githubApiUrl);
  } catch (e) {
    throw new Error(`GITHUB_API_URL is not a valid URL: ${config.githubApiUrl}`, { cause: e });
  }
}

/**
 * Token from the environment, then from the gh CLI's credential store.
 * Returns an empty string when neither has one.
 */
export function resolveGitHubToken(): string {
  if (config.githubToken) {
    return config.githubToken;
  }

  try {
    return execFileSync('gh', ['auth', 'token', '--hostname', config.githubHost], {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
  } catch {
    // gh not installed or not logged in
    return '';
  }
}
