/**
 * Site-wide template payload
 */

import { Payload } from '../../types/payload';
import { Post } from '../post/post';
import { postSummary } from '../render/postPayload';
import { SiteConfig } from './config';

/**
 * Groups posts by each of their categories or tags, keeping the given order
 */
export function groupPosts(posts: readonly Post[], key: 'categories' | 'tags'): Map<string, Post[]> {
  const groups = new Map<string, Post[]>();
  for (const post of posts) {
    for (const name of post[key]) {
      const group = groups.get(name);
      if (group) {
        group.push(post);
      } else {
        groups.set(name, [post]);
      }
    }
  }
  return groups;
}

function groupPayload(groups: Map<string, Post[]>): Payload {
  const payload: Payload = {};
  for (const [name, posts] of groups) {
    payload[name] = posts.map(postSummary);
  }
  return payload;
}

/**
 * `{ site: { ...config, time, posts, categories, tags } }` with posts newest first
 *
 * @param posts - Posts oldest first
 */
export function buildSitePayload(config: SiteConfig, posts: readonly Post[], time: Date): Payload {
  const newestFirst = [...posts].reverse();

  return {
    site: {
      ...config.extra,
      permalink: config.permalink,
      multiviews: config.multiviews,
      time,
      posts: newestFirst.map(postSummary),
      categories: groupPayload(groupPosts(newestFirst, 'categories')),
      tags: groupPayload(groupPosts(newestFirst, 'tags')),
    },
  };
}
