import { formatRef } from './reference.js';
import { compareByCreation, groupByFile } from './threads.js';
import type { IssueComment, PullRequestInfo, PullRequestRef, ReviewComment, ReviewThread } from './types.js';

export interface RenderInput {
  ref: PullRequestRef;
  pullRequest: PullRequestInfo;
  issueComments: readonly IssueComment[];
  threads: readonly ReviewThread[];
}

/** A fence longer than any backtick run inside `text`. */
export function fenceFor(text: string): string {
  const longest = Math.max(0, ...(text.match(/`+/g) ?? []).map((run) => run.length));
  return '`'.repeat(Math.max(3, longest + 1));
}

function normalizeBody(body: string): string {
  const text = body.replace(/\r\n?/g, '\n').replace(/\s+$/, '');
  return text.trim() === '' ? '_(no content)_' : text;
}

function renderCommentBlock(level: number, comment: IssueComment | ReviewComment): string {
  const heading = `${'#'.repeat(level)} @${comment.author} · ${comment.createdAt}`;
  return [heading, `[View on GitHub](${comment.url})`, normalizeBody(comment.body)].join('\n\n');
}

function threadHeading(thread: ReviewThread): string {
  const location = thread.line !== null ? `${thread.path}:${thread.line}` : thread.path;
  const flags = [thread.isResolved && 'resolved', thread.isOutdated && 'outdated'].filter(Boolean);
  return `### ${location}${flags.length > 0 ? ` (${flags.join(', ')})` : ''}`;
}

function renderThread(thread: ReviewThread): string[] {
  const blocks = [threadHeading(thread)];

  const hunk = thread.root.diffHunk?.replace(/\r\n?/g, '\n').replace(/\s+$/, '');
  if (hunk) {
    const fence = fenceFor(hunk);
    blocks.push(`${fence}diff\n${hunk}\n${fence}`);
  }

  for (const comment of [thread.root, ...thread.replies]) {
    blocks.push(renderCommentBlock(4, comment));
  }
  return blocks;
}

function renderHeader(ref: PullRequestRef, pr: PullRequestInfo): string {
  return [
    `# PR #${ref.number}: ${pr.title}`,
    '',
    `- **Repository:** ${ref.owner}/${ref.repo}`,
    `- **URL:** ${pr.url}`,
    `- **State:** ${pr.state}`,
    `- **Author:** @${pr.author}`,
    `- **Created:** ${pr.createdAt}`,
  ].join('\n');
}

/**
 * Render the pull request discussion. The output depends only on the input:
 * general comments by creation time, then one section per file (sorted by
 * path) with its threads by creation time of their first comment.
 */
export function renderMarkdown(input: RenderInput): string {
  const blocks = [renderHeader(input.ref, input.pullRequest)];

  const general = [...input.issueComments].sort(compareByCreation);
  if (general.length > 0) {
    blocks.push('## General Comments');
    for (const comment of general) {
      blocks.push(renderCommentBlock(3, comment));
    }
  }

  for (const group of groupByFile(input.threads)) {
    blocks.push(`## ${group.path}`);
    for (const thread of group.threads) {
      blocks.push(...renderThread(thread));
    }
  }

  if (general.length === 0 && input.threads.length === 0) {
    blocks.push(`_No comments on ${formatRef(input.ref)}._`);
  }

  return `${blocks.join('\n\n')}\n`;
}
