/**
 * Exports a post's visible fields for templates
 */

import { Payload } from '../../types/payload';
import { Post } from '../post/post';
import { Adjacency } from '../post/ordering';
import { deepMerge } from './merge';

function computedFields(post: Post): Payload {
  return {
    title: post.title,
    url: post.url,
    date: post.date,
    id: post.identifier,
    path: post.path,
    topics: [...post.topics],
    categories: [...post.categories],
    tags: [...post.tags],
    content: post.content,
  };
}

/**
 * A post as it appears inside another page's payload (site.posts,
 * related_posts, next, previous): every field except the neighbours,
 * overlaid by its front matter.
 */
export function postSummary(post: Post): Payload {
  return deepMerge(computedFields(post), post.metadata);
}

/**
 * The `page` payload of a post. Front matter wins over a computed field of
 * the same name.
 */
export function postPayload(post: Post, adjacency: Adjacency<Post>): Payload {
  const next = adjacency.next(post);
  const previous = adjacency.previous(post);

  return deepMerge(
    {
      ...computedFields(post),
      next: next ? postSummary(next) : null,
      previous: previous ? postSummary(previous) : null,
    },
    post.metadata
  );
}
