import { renderMarkdown } from './markdown.js';
import { buildReviewThreads, filterResolved } from './threads.js';
import type { PullRequestComments, PullRequestRef } from './types.js';

export interface CommentSource {
  getComments(ref: PullRequestRef): Promise<PullRequestComments>;
}

export interface PrCommentsOptions {
  includeResolved?: boolean;
}

export interface PrCommentsResult {
  markdown: string;
  commentCount: number;
  hiddenThreads: number;
}

export async function fetchPrCommentsMarkdown(
  source: CommentSource,
  ref: PullRequestRef,
  options: PrCommentsOptions = {}
): Promise<PrCommentsResult> {
  const { pullRequest, issueComments, reviewComments, threadStates } = await source.getComments(ref);

  const allThreads = buildReviewThreads(reviewComments, threadStates);
  const threads = options.includeResolved ? allThreads : filterResolved(allThreads);
  const shownReviewComments = threads.reduce((sum, t) => sum + 1 + t.replies.length, 0);

  return {
    markdown: renderMarkdown({ ref, pullRequest, issueComments, threads }),
    commentCount: issueComments.length + shownReviewComments,
    hiddenThreads: allThreads.length - threads.length,
  };
}
