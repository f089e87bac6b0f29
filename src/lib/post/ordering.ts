/**
 * Chronological ordering of posts and next/previous lookup
 */

/**
 * Anything with a date and a stable identifier
 */
export interface Orderable {
  readonly date: Date;
  readonly identifier: string;
}

/**
 * Compares posts by date only; posts on the same instant compare equal
 */
export function comparePosts(a: Orderable, b: Orderable): number {
  return a.date.getTime() - b.date.getTime();
}

/**
 * Oldest first. Array.prototype.sort is stable, so same-date posts keep
 * their input order.
 */
export function sortPosts<T extends Orderable>(posts: readonly T[]): T[] {
  return [...posts].sort(comparePosts);
}

function positionOf<T extends Orderable>(post: Orderable, ordered: readonly T[]): number {
  return ordered.findIndex((candidate) => candidate.identifier === post.identifier);
}

/**
 * The post after `post` in `ordered`, or undefined at the end or when absent
 */
export function nextPost<T extends Orderable>(post: Orderable, ordered: readonly T[]): T | undefined {
  const position = positionOf(post, ordered);
  return position >= 0 && position < ordered.length - 1 ? ordered[position + 1] : undefined;
}

/**
 * The post before `post` in `ordered`, or undefined at the start or when absent
 */
export function previousPost<T extends Orderable>(post: Orderable, ordered: readonly T[]): T | undefined {
  const position = positionOf(post, ordered);
  return position > 0 ? ordered[position - 1] : undefined;
}

export interface Adjacency<T> {
  next(post: Orderable): T | undefined;
  previous(post: Orderable): T | undefined;
}

/**
 * Precomputes positions once for repeated next/previous lookups over the
 * same collection. Same results as nextPost/previousPost.
 */
export function createAdjacency<T extends Orderable>(ordered: readonly T[]): Adjacency<T> {
  const positions = new Map<string, number>();
  ordered.forEach((post, index) => {
    // First occurrence wins, matching findIndex
    if (!positions.has(post.identifier)) {
      positions.set(post.identifier, index);
    }
  });

  return {
    next(post) {
      const position = positions.get(post.identifier);
      return position !== undefined && position < ordered.length - 1 ? ordered[position + 1] : undefined;
    },
    previous(post) {
      const position = positions.get(post.identifier);
      return position !== undefined && position > 0 ? ordered[position - 1] : undefined;
    },
  };
}
