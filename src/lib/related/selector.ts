/**
 * Related-post selection
 */

import { RelatedPostIndex } from './relatedIndex';
import { Indexable } from './similarityEngine';

export const MAX_RELATED_POSTS = 10;

/**
 * Chooses up to ten posts related to `post`, never `post` itself.
 *
 * Without an index the first ten other candidates are taken in the order
 * given. With one, the eleven nearest neighbours of the post's content are
 * requested and the post is removed from them.
 */
export async function selectRelatedPosts<T extends Indexable>(
  post: Indexable,
  candidates: readonly T[],
  index?: RelatedPostIndex<T>
): Promise<T[]> {
  if (candidates.length < 2) {
    return [];
  }

  const isOther = (candidate: T): boolean => candidate.identifier !== post.identifier;

  if (!index) {
    return candidates.filter(isOther).slice(0, MAX_RELATED_POSTS);
  }

  const nearest = await index.query(post.content, MAX_RELATED_POSTS + 1);
  return nearest.filter(isOther).slice(0, MAX_RELATED_POSTS);
}
