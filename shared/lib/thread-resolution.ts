/**
 * Thread resolution for Gerrit review comments.
 *
 * A thread is a root comment plus every reply that reaches it through
 * inReplyTo links. The last comment in the thread that carries an explicit
 * status decides whether the whole thread is resolved.
 *
 * @module thread-resolution
 */

// ────────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────────

export type ThreadStatus = 'resolved' | 'unresolved' | 'none';

export interface ThreadMember {
  /** Comment id, if the payload carries one */
  id?: string;
  /** Id of the comment this one replies to */
  inReplyTo?: string;
  /** Raw `unresolved` flag (undefined when the record has no status) */
  unresolved?: boolean;
}

// ────────────────────────────────────────────────────────────────
// Status fold
// ────────────────────────────────────────────────────────────────

export function toThreadStatus(unresolved: boolean | undefined): ThreadStatus {
  if (unresolved === undefined) return 'none';
  return unresolved ? 'unresolved' : 'resolved';
}

/**
 * Fold an ordered list of statuses into the thread's state.
 * The latest explicit status wins; a thread with none is resolved.
 *
 * @example
 * ```typescript
 * resolveThreadStatus(['unresolved', 'none', 'resolved']); // 'resolved'
 * resolveThreadStatus(['resolved', 'unresolved']);         // 'unresolved'
 * ```
 */
export function resolveThreadStatus(statuses: readonly ThreadStatus[]): Exclude<ThreadStatus, 'none'> {
  return statuses.reduce<Exclude<ThreadStatus, 'none'>>(
    (state, status) => (status === 'none' ? state : status),
    'resolved',
  );
}

// ────────────────────────────────────────────────────────────────
// Thread grouping
// ────────────────────────────────────────────────────────────────

/**
 * Find the index of the root comment for every comment.
 * Parents that are not in the list end the walk, as do cycles.
 */
function findRoots(comments: readonly ThreadMember[]): number[] {
  const indexById = new Map<string, number>();
  comments.forEach((comment, index) => {
    if (comment.id !== undefined && !indexById.has(comment.id)) {
      indexById.set(comment.id, index);
    }
  });

  return comments.map((_, start) => {
    const visited = new Set<number>([start]);
    let current = start;

    for (;;) {
      const parentId = comments[current].inReplyTo;
      const parent = parentId === undefined ? undefined : indexById.get(parentId);
      if (parent === undefined || visited.has(parent)) {
        return current;
      }
      visited.add(parent);
      current = parent;
    }
  });
}

/**
 * Compute the resolved flag of each comment from its thread.
 *
 * @param comments - Comments in payload order
 * @returns Resolved flag per comment, aligned with the input
 */
export function computeThreadResolution(comments: readonly ThreadMember[]): boolean[] {
  const roots = findRoots(comments);

  const threads = new Map<number, ThreadStatus[]>();
  comments.forEach((comment, index) => {
    const statuses = threads.get(roots[index]) ?? [];
    statuses.push(toThreadStatus(comment.unresolved));
    threads.set(roots[index], statuses);
  });

  const stateByRoot = new Map<number, boolean>();
  for (const [root, statuses] of threads) {
    stateByRoot.set(root, resolveThreadStatus(statuses) === 'resolved');
  }

  return roots.map((root) => stateByRoot.get(root) ?? true);
}
