export interface RepositorySlug {
  owner: string;
  repo: string;
}

export interface PullRequestRef extends RepositorySlug {
  number: number;
}

export interface PullRequestInfo {
  number: number;
  title: string;
  state: string;
  author: string;
  url: string;
  createdAt: string;
}

export interface IssueComment {
  id: number;
  author: string;
  body: string;
  createdAt: string;
  url: string;
}

export interface ReviewComment {
  id: number;
  author: string;
  body: string;
  createdAt: string;
  url: string;
  path: string;
  line: number | null;
  diffHunk: string | null;
  inReplyToId: number | null;
}

export interface ThreadState {
  threadId: string;
  isResolved: boolean;
  isOutdated: boolean;
}

/** Keyed by review comment database id. */
export type ThreadStates = ReadonlyMap<number, ThreadState>;

export interface ReviewThread {
  id: string;
  path: string;
  line: number | null;
  isResolved: boolean;
  isOutdated: boolean;
  root: ReviewComment;
  replies: ReviewComment[];
}

export interface FileGroup {
  path: string;
  threads: ReviewThread[];
}

export interface PullRequestComments {
  pullRequest: PullRequestInfo;
  issueComments: IssueComment[];
  reviewComments: ReviewComment[];
  threadStates: ThreadStates;
}
