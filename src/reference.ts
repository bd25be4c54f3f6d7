import { invalidReference, missingRepository } from './errors.js';
import type { PullRequestRef, RepositorySlug } from './types.js';

export type ReferenceSource = 'url' | 'short' | 'repo-option' | 'git-remote';

export interface ResolvedReference {
  ref: PullRequestRef;
  source: ReferenceSource;
  /** Set when --repo named a different repository than the one in the input. */
  ignoredRepo?: string;
}

export interface ResolveOptions {
  repo?: string;
  /** Looks up the repository of the working directory. Only called for bare numbers. */
  detectRepository: () => Promise<RepositorySlug>;
}

const URL_PATH_PATTERN = /^\/([^/]+)\/([^/]+)\/pull\/(\d+)(?:\/|$)/;
const SHORT_PULL_PATTERN = /^([\w.-]+)\/([\w.-]+)\/pull\/(\d+)$/;
const SHORT_HASH_PATTERN = /^([\w.-]+)\/([\w.-]+)#(\d+)$/;
const NUMBER_PATTERN = /^#?(\d+)$/;
const REPO_PATTERN = /^([\w.-]+)\/([\w.-]+?)(?:\.git)?$/;
const REMOTE_PATTERN =
  /^(?:[a-z][a-z0-9+.-]*:\/\/)?(?:[^@/]+@)?([^/:]+)(?::\d+)?[:/]([^/]+)\/([^/]+?)(?:\.git)?\/?$/i;

export function formatRef(ref: PullRequestRef): string {
  return `${ref.owner}/${ref.repo}#${ref.number}`;
}

export function parsePrNumber(value: string, input: string): number {
  const number = parseInt(value, 10);
  if (!Number.isSafeInteger(number) || number <= 0) {
    throw invalidReference(`Invalid pull request number in "${input}"`);
  }
  return number;
}

/**
 * Parse an http(s) pull request URL. Returns null when the input is not an
 * http(s) URL at all; throws when it is one but does not point at a pull request.
 */
export function parsePullRequestUrl(input: string): PullRequestRef | null {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return null;
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    return null;
  }

  const match = url.pathname.match(URL_PATH_PATTERN);
  if (!match) {
    throw invalidReference(
      `Invalid GitHub pull request URL: ${input} (expected https://github.com/owner/repo/pull/123)`
    );
  }
  return {
    owner: decodeURIComponent(match[1]),
    repo: decodeURIComponent(match[2]),
    number: parsePrNumber(match[3], input),
  };
}

export function parseRepository(value: string): RepositorySlug {
  const match = value.trim().match(REPO_PATTERN);
  if (!match) {
    throw invalidReference(`Invalid repository "${value}". Expected 'owner/name'`);
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * Extract owner/repo from a git remote URL (https, scp-like ssh or ssh://).
 * Returns null when the remote is not on `host`.
 */
export function parseRemoteUrl(remoteUrl: string, host = 'github.com'): RepositorySlug | null {
  const match = remoteUrl.trim().match(REMOTE_PATTERN);
  if (!match || match[1].toLowerCase() !== host.toLowerCase()) {
    return null;
  }
  return { owner: match[2], repo: match[3] };
}

function sameRepository(a: RepositorySlug, b: RepositorySlug): boolean {
  return a.owner.toLowerCase() === b.owner.toLowerCase() && a.repo.toLowerCase() === b.repo.toLowerCase();
}

export async function resolveReference(
  rawInput: string,
  options: ResolveOptions
): Promise<ResolvedReference> {
  const input = rawInput.trim();

  const embedded = (ref: PullRequestRef, source: ReferenceSource): ResolvedReference => {
    const resolved: ResolvedReference = { ref, source };
    if (options.repo !== undefined) {
      // The reference already names the repository: --repo is only reported, never validated.
      const match = options.repo.trim().match(REPO_PATTERN);
      if (!match) {
        resolved.ignoredRepo = options.repo;
      } else if (!sameRepository({ owner: match[1], repo: match[2] }, ref)) {
        resolved.ignoredRepo = `${match[1]}/${match[2]}`;
      }
    }
    return resolved;
  };

  const fromUrl = parsePullRequestUrl(input);
  if (fromUrl) {
    return embedded(fromUrl, 'url');
  }

  const shortMatch = input.match(SHORT_PULL_PATTERN) ?? input.match(SHORT_HASH_PATTERN);
  if (shortMatch) {
    return embedded(
      { owner: shortMatch[1], repo: shortMatch[2], number: parsePrNumber(shortMatch[3], input) },
      'short'
    );
  }

  const numberMatch = input.match(NUMBER_PATTERN);
  if (!numberMatch) {
    throw invalidReference(
      `Could not parse pull request "${rawInput}". Expected a PR number (e.g. 137), ` +
        'a URL (e.g. https://github.com/owner/repo/pull/137) or owner/repo#137'
    );
  }
  const number = parsePrNumber(numberMatch[1], input);

  if (options.repo !== undefined) {
    return { ref: { ...parseRepository(options.repo), number }, source: 'repo-option' };
  }

  const slug = await options.detectRepository();
  return { ref: { ...slug, number }, source: 'git-remote' };
}

/**
 * Repository detection backed by the working directory's remote.
 */
export function gitRemoteDetector(
  git: { getRemoteUrl(name?: string): Promise<string | null> },
  host: string,
  remoteName = 'origin'
): () => Promise<RepositorySlug> {
  return async () => {
    let remoteUrl: string | null;
    try {
      remoteUrl = await git.getRemoteUrl(remoteName);
    } catch (e) {
      throw missingRepository(
        'Could not read the git configuration of the current directory. Pass --repo owner/name',
        e
      );
    }
    if (!remoteUrl) {
      throw missingRepository(
        `No git remote '${remoteName}' found in the current directory. Pass --repo owner/name or a full PR URL`
      );
    }

    const slug = parseRemoteUrl(remoteUrl, host);
    if (!slug) {
      throw missingRepository(
        `Git remote '${remoteName}' (${remoteUrl}) is not a ${host} repository. Pass --repo owner/name`
      );
    }
    return slug;
  };
}
