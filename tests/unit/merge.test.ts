/**
 * Unit tests for payload merging
 */

import { deepMerge, isMapping } from '../../src/lib/render/merge';

describe('isMapping', () => {
  it('should accept plain mappings only', () => {
    expect(isMapping({ a: 1 })).toBe(true);
    expect(isMapping([1])).toBe(false);
    expect(isMapping(new Date())).toBe(false);
    expect(isMapping(null)).toBe(false);
    expect(isMapping('text')).toBe(false);
  });
});

describe('deepMerge', () => {
  it('should merge mappings recursively with the source winning', () => {
    expect(
      deepMerge(
        { site: { title: 'Page', related_posts: [] }, keep: 1, list: [1, 2] },
        { site: { title: 'Site', name: 'Blog' }, list: [3] }
      )
    ).toEqual({
      site: { title: 'Site', related_posts: [], name: 'Blog' },
      keep: 1,
      list: [3],
    });
  });

  it('should replace a mapping with a scalar and a scalar with a mapping', () => {
    expect(deepMerge({ a: { b: 1 }, c: 'x' }, { a: 'flat', c: { d: 2 } })).toEqual({
      a: 'flat',
      c: { d: 2 },
    });
  });

  it('should not modify its inputs', () => {
    const target = { page: { title: 'A' } };
    const source = { page: { url: '/a' } };

    deepMerge(target, source);

    expect(target).toEqual({ page: { title: 'A' } });
    expect(source).toEqual({ page: { url: '/a' } });
  });
});
