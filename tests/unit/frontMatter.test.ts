/**
 * Unit tests for front matter decoding and category/tag normalization
 */

import { decodeFrontMatter, scalarToString, toMetadata } from '../../src/lib/post/frontMatter';
import { categoriesFromDir, normalizeCategories, normalizeTags } from '../../src/lib/post/taxonomy';

describe('toMetadata', () => {
  it('should keep YAML values and null out the rest', () => {
    const date = new Date(Date.UTC(2008, 10, 5));
    expect(
      toMetadata({
        title: 'Post',
        count: 3,
        draft: false,
        when: date,
        nested: { list: [1, 'two'] },
        callback: () => undefined,
      })
    ).toEqual({
      title: 'Post',
      count: 3,
      draft: false,
      when: date,
      nested: { list: [1, 'two'] },
      callback: null,
    });
  });

  it('should return an empty mapping for non-mappings', () => {
    expect(toMetadata(['a'])).toEqual({});
    expect(toMetadata('text')).toEqual({});
    expect(toMetadata(null)).toEqual({});
  });
});

describe('scalarToString', () => {
  it('should stringify scalars only', () => {
    expect(scalarToString('a')).toBe('a');
    expect(scalarToString(7)).toBe('7');
    expect(scalarToString(true)).toBe('true');
    expect(scalarToString(new Date(Date.UTC(2008, 10, 5)))).toBe('2008-11-05T00:00:00.000Z');
    expect(scalarToString(['a'])).toBeUndefined();
    expect(scalarToString(null)).toBeUndefined();
  });
});

describe('decodeFrontMatter', () => {
  it('should decode recognized keys', () => {
    expect(
      decodeFrontMatter({
        title: 'Title',
        permalink: '/about/',
        categories: 'code ruby',
        tags: ['web', 2],
        time: '2:30 pm',
        published: false,
        layout: 'post',
      })
    ).toEqual({
      title: 'Title',
      permalink: '/about/',
      categories: { kind: 'list', values: ['code', 'ruby'] },
      tags: ['web', '2'],
      time: '2:30 pm',
      published: false,
      layout: 'post',
    });
  });

  it('should default to published with no categories or tags', () => {
    expect(decodeFrontMatter({})).toEqual({
      categories: { kind: 'none' },
      tags: [],
      published: true,
    });
  });

  it('should prefer category over categories', () => {
    expect(decodeFrontMatter({ category: 'one', categories: ['two'] }).categories).toEqual({
      kind: 'single',
      value: 'one',
    });
  });

  it('should split tags given as a string', () => {
    expect(decodeFrontMatter({ tags: 'web  design' }).tags).toEqual(['web', 'design']);
  });

  it('should turn a base-60 time back into hours and minutes', () => {
    expect(decodeFrontMatter({ time: 870 }).time).toBe('14:30');
    expect(decodeFrontMatter({ time: 5 }).time).toBe('0:05');
  });

  it('should keep larger numbers as written', () => {
    expect(decodeFrontMatter({ time: 2000 }).time).toBe('2000');
  });
});

describe('normalizeCategories', () => {
  it('should take categories from the directory', () => {
    expect(categoriesFromDir('code/ruby')).toEqual(['code', 'ruby']);
    expect(normalizeCategories('code/ruby', { kind: 'single', value: 'ignored' })).toEqual([
      'code',
      'ruby',
    ]);
  });

  it('should use front matter when the directory gives none', () => {
    expect(normalizeCategories('', { kind: 'single', value: 'news' })).toEqual(['news']);
    expect(normalizeCategories('', { kind: 'list', values: ['a', 'b'] })).toEqual(['a', 'b']);
    expect(normalizeCategories('', { kind: 'none' })).toEqual([]);
  });
});

describe('normalizeTags', () => {
  it('should copy the tag list', () => {
    const tags = ['a', 'b'];
    const normalized = normalizeTags(tags);
    expect(normalized).toEqual(['a', 'b']);
    expect(normalized).not.toBe(tags);
  });
});
