/**
 * Unit tests for post ordering and next/previous lookup
 */

import {
  Orderable,
  comparePosts,
  createAdjacency,
  nextPost,
  previousPost,
  sortPosts,
} from '../../src/lib/post/ordering';

function entry(identifier: string, day: number): Orderable {
  return { identifier, date: new Date(2008, 10, day) };
}

describe('comparePosts', () => {
  it('should compare by date only', () => {
    expect(comparePosts(entry('/a', 1), entry('/b', 2))).toBeLessThan(0);
    expect(comparePosts(entry('/a', 2), entry('/b', 2))).toBe(0);
  });
});

describe('sortPosts', () => {
  it('should sort oldest first keeping same-date posts in input order', () => {
    const a = entry('/a', 2);
    const b = entry('/b', 1);
    const c = entry('/c', 2);
    const posts = [a, b, c];

    expect(sortPosts(posts)).toEqual([b, a, c]);
    expect(posts).toEqual([a, b, c]);
  });
});

describe('next and previous', () => {
  const ordered = [entry('/a', 1), entry('/b', 2), entry('/c', 3)];
  const adjacency = createAdjacency(ordered);

  it('should find neighbours', () => {
    expect(nextPost(ordered[1], ordered)).toBe(ordered[2]);
    expect(previousPost(ordered[1], ordered)).toBe(ordered[0]);
  });

  it('should return undefined at the boundaries', () => {
    expect(nextPost(ordered[2], ordered)).toBeUndefined();
    expect(previousPost(ordered[0], ordered)).toBeUndefined();
  });

  it('should return undefined for posts not in the collection', () => {
    expect(nextPost(entry('/z', 2), ordered)).toBeUndefined();
    expect(previousPost(entry('/z', 2), ordered)).toBeUndefined();
  });

  it('should match by identifier', () => {
    expect(nextPost(entry('/a', 9), ordered)).toBe(ordered[1]);
  });

  it('should give the same answers through the adjacency', () => {
    for (const post of [...ordered, entry('/z', 2)]) {
      expect(adjacency.next(post)).toBe(nextPost(post, ordered));
      expect(adjacency.previous(post)).toBe(previousPost(post, ordered));
    }
  });
});
