import { Octokit, RequestError } from 'octokit';
import { z } from 'zod';
import { PrCommentsError } from './errors.js';
import { formatRef } from './reference.js';
import type {
  IssueComment,
  PullRequestComments,
  PullRequestInfo,
  PullRequestRef,
  ReviewComment,
  ThreadState,
} from './types.js';

const PER_PAGE = 100;

export interface GitHubClientOptions {
  token?: string;
  baseUrl?: string;
  /** Retries for 5xx and network failures. 4xx responses are never retried. */
  maxRetries?: number;
  /** Back-off unit in ms; the n-th retry waits n² units. */
  retryAfterBaseValue?: number;
  signal?: AbortSignal;
  fetch?: typeof fetch;
}

const userSchema = z.object({ login: z.string() }).nullable().optional();

const pullRequestSchema = z.object({
  number: z.number(),
  title: z.string(),
  state: z.string(),
  html_url: z.string(),
  created_at: z.string(),
  merged_at: z.string().nullable().optional(),
  user: userSchema,
});

const issueCommentSchema = z.object({
  id: z.number(),
  body: z.string().nullable().optional(),
  html_url: z.string(),
  created_at: z.string(),
  user: userSchema,
});

const reviewCommentSchema = z.object({
  id: z.number(),
  body: z.string(),
  html_url: z.string(),
  created_at: z.string(),
  path: z.string(),
  line: z.number().nullable().optional(),
  original_line: z.number().nullable().optional(),
  diff_hunk: z.string().nullable().optional(),
  in_reply_to_id: z.number().nullable().optional(),
  user: userSchema,
});

const reviewThreadsSchema = z.object({
  repository: z
    .object({
      pullRequest: z
        .object({
          reviewThreads: z.object({
            pageInfo: z.object({
              hasNextPage: z.boolean(),
              endCursor: z.string().nullable(),
            }),
            nodes: z.array(
              z.object({
                id: z.string(),
                isResolved: z.boolean(),
                isOutdated: z.boolean(),
                comments: z.object({
                  nodes: z.array(z.object({ databaseId: z.number().nullable() })),
                }),
              })
            ),
          }),
        })
        .nullable(),
    })
    .nullable(),
});

const REVIEW_THREADS_QUERY = `
  query($owner: String!, $repo: String!, $number: Int!, $cursor: String) {
    repository(owner: $owner, name: $repo) {
      pullRequest(number: $number) {
        reviewThreads(first: ${PER_PAGE}, after: $cursor) {
          pageInfo {
            hasNextPage
            endCursor
          }
          nodes {
            id
            isResolved
            isOutdated
            comments(first: 1) {
              nodes {
                databaseId
              }
            }
          }
        }
      }
    }
  }
`;

function parsePayload<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  ref: PullRequestRef,
  what: string
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new PrCommentsError(
      'RenderError',
      `Unexpected ${what} payload for ${formatRef(ref)}${where}: ${issue?.message ?? 'invalid'}`,
      { cause: result.error }
    );
  }
  return result.data;
}

export class GitHubClient {
  private octokit: Octokit;
  /** GitHub's GraphQL API rejects unauthenticated requests. */
  readonly canReadThreadStates: boolean;

  constructor(options: GitHubClientOptions = {}) {
    this.canReadThreadStates = Boolean(options.token);
    this.octokit = new Octokit({
      auth: options.token || undefined,
      baseUrl: options.baseUrl,
      userAgent: 'pr-comments',
      retry: {
        retries: options.maxRetries ?? 3,
        retryAfterBaseValue: options.retryAfterBaseValue ?? 1000,
      },
      request: {
        signal: options.signal,
        fetch: options.fetch,
      },
    });
  }

  private async call<T>(ref: PullRequestRef, what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (e instanceof PrCommentsError) {
        throw e;
      }
      if (e instanceof RequestError) {
        throw new PrCommentsError(
          'ApiError',
          `Failed to fetch ${what} for ${formatRef(ref)} (HTTP ${e.status}): ${e.message}`,
          { status: e.status, cause: e }
        );
      }
      const message = e instanceof Error ? e.message : String(e);
      throw new PrCommentsError(
        'ApiError',
        `Failed to fetch ${what} for ${formatRef(ref)}: ${message}`,
        { cause: e }
      );
    }
  }

  async getPullRequest(ref: PullRequestRef): Promise<PullRequestInfo> {
    const { data } = await this.call(ref, 'pull request', () =>
      this.octokit.rest.pulls.get({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.number,
      })
    );

    const pr = parsePayload(pullRequestSchema, data, ref, 'pull request');
    return {
      number: pr.number,
      title: pr.title,
      state: pr.merged_at ? 'merged' : pr.state,
      author: pr.user?.login || 'ghost',
      url: pr.html_url,
      createdAt: pr.created_at,
    };
  }

  async getIssueComments(ref: PullRequestRef): Promise<IssueComment[]> {
    const data = await this.call(ref, 'comments', () =>
      this.octokit.paginate(this.octokit.rest.issues.listComments, {
        owner: ref.owner,
        repo: ref.repo,
        issue_number: ref.number,
        per_page: PER_PAGE,
      })
    );

    return parsePayload(z.array(issueCommentSchema), data, ref, 'comment').map((comment) => ({
      id: comment.id,
      author: comment.user?.login || 'ghost',
      body: comment.body ?? '',
      createdAt: comment.created_at,
      url: comment.html_url,
    }));
  }

  async getReviewComments(ref: PullRequestRef): Promise<ReviewComment[]> {
    const data = await this.call(ref, 'review comments', () =>
      this.octokit.paginate(this.octokit.rest.pulls.listReviewComments, {
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.number,
        per_page: PER_PAGE,
      })
    );

    return parsePayload(z.array(reviewCommentSchema), data, ref, 'review comment').map(
      (comment) => ({
        id: comment.id,
        author: comment.user?.login || 'ghost',
        body: comment.body,
        createdAt: comment.created_at,
        url: comment.html_url,
        path: comment.path,
        line: comment.line ?? comment.original_line ?? null,
        diffHunk: comment.diff_hunk || null,
        inReplyToId: comment.in_reply_to_id ?? null,
      })
    );
  }

  /**
   * Resolution state of every review thread, keyed by the database id of the
   * thread's first comment.
   */
  async getReviewThreadStates(ref: PullRequestRef): Promise<Map<number, ThreadState>> {
    const states = new Map<number, ThreadState>();
    let cursor: string | null = null;

    do {
      const data: unknown = await this.call(ref, 'review threads', () =>
        this.octokit.graphql(REVIEW_THREADS_QUERY, {
          owner: ref.owner,
          repo: ref.repo,
          number: ref.number,
          cursor,
        })
      );

      const pr = parsePayload(reviewThreadsSchema, data, ref, 'review thread').repository?.pullRequest;
      if (!pr) {
        throw new PrCommentsError('ApiError', `Pull request ${formatRef(ref)} not found`, {
          status: 404,
        });
      }

      for (const thread of pr.reviewThreads.nodes) {
        const first = thread.comments.nodes[0]?.databaseId;
        if (first != null) {
          states.set(first, {
            threadId: thread.id,
            isResolved: thread.isResolved,
            isOutdated: thread.isOutdated,
          });
        }
      }

      const { hasNextPage, endCursor } = pr.reviewThreads.pageInfo;
      cursor = hasNextPage ? endCursor : null;
    } while (cursor);

    return states;
  }

  async getComments(ref: PullRequestRef): Promise<PullRequestComments> {
    const pullRequest = await this.getPullRequest(ref);
    const [issueComments, reviewComments, threadStates] = await Promise.all([
      this.getIssueComments(ref),
      this.getReviewComments(ref),
      this.canReadThreadStates
        ? this.getReviewThreadStates(ref)
        : Promise.resolve(new Map<number, ThreadState>()),
    ]);
    return { pullRequest, issueComments, reviewComments, threadStates };
  }
}
