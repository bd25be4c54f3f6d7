import type { FileGroup, ReviewComment, ReviewThread, ThreadStates } from './types.js';

export function compareByCreation(
  a: { createdAt: string; id: number },
  b: { createdAt: string; id: number }
): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? -1 : 1;
  }
  return a.id - b.id;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Follow in_reply_to links up to the first comment of the thread. A comment
 * whose parent is not in `byId` is treated as a root. Cycles stop at the
 * first repeated id.
 */
function findRoot(comment: ReviewComment, byId: Map<number, ReviewComment>): ReviewComment {
  const seen = new Set<number>();
  let current = comment;
  while (!seen.has(current.id)) {
    seen.add(current.id);
    const parent = current.inReplyToId === null ? undefined : byId.get(current.inReplyToId);
    if (!parent) break;
    current = parent;
  }
  return current;
}

export function buildReviewThreads(
  comments: readonly ReviewComment[],
  states: ThreadStates = new Map()
): ReviewThread[] {
  const byId = new Map(comments.map((c) => [c.id, c]));
  const members = new Map<number, ReviewComment[]>();

  for (const comment of comments) {
    const root = findRoot(comment, byId);
    const list = members.get(root.id);
    if (list) {
      list.push(comment);
    } else {
      members.set(root.id, [comment]);
    }
  }

  const threads: ReviewThread[] = [];
  for (const [rootId, list] of members) {
    const sorted = [...list].sort(compareByCreation);
    const root = byId.get(rootId) ?? sorted[0];
    const replies = sorted.filter((c) => c !== root);
    const state = states.get(root.id) ?? replies.map((r) => states.get(r.id)).find(Boolean);

    threads.push({
      id: state?.threadId ?? String(root.id),
      path: root.path,
      line: root.line,
      isResolved: state?.isResolved ?? false,
      isOutdated: state?.isOutdated ?? false,
      root,
      replies,
    });
  }

  return threads.sort((a, b) => compareByCreation(a.root, b.root));
}

export function filterResolved(threads: readonly ReviewThread[]): ReviewThread[] {
  return threads.filter((t) => !t.isResolved);
}

export function groupByFile(threads: readonly ReviewThread[]): FileGroup[] {
  const groups = new Map<string, ReviewThread[]>();
  for (const thread of threads) {
    const list = groups.get(thread.path);
    if (list) {
      list.push(thread);
    } else {
      groups.set(thread.path, [thread]);
    }
  }

  return [...groups.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([path, list]) => ({
      path,
      threads: [...list].sort((a, b) => compareByCreation(a.root, b.root)),
    }));
}
