/**
 * Unit tests for post filename parsing
 */

import {
  isValidPostFilename,
  parseFilenameDate,
  parsePostFilename,
} from '../../src/lib/post/filename';

describe('isValidPostFilename', () => {
  it('should accept dated filenames', () => {
    expect(isValidPostFilename('2008-11-05-hello.md')).toBe(true);
    expect(isValidPostFilename('2008-11-05_14-30-hello.textile')).toBe(true);
    expect(isValidPostFilename('ruby/2008-11-05-hello.md')).toBe(true);
  });

  it('should reject names without date, slug or extension', () => {
    expect(isValidPostFilename('hello.md')).toBe(false);
    expect(isValidPostFilename('2008-11-05-hello')).toBe(false);
    expect(isValidPostFilename('2008-11-05.md')).toBe(false);
  });
});

describe('parseFilenameDate', () => {
  it('should parse a date at local midnight', () => {
    expect(parseFilenameDate('2008-11-05')).toEqual(new Date(2008, 10, 5));
  });

  it('should parse a date with time of day', () => {
    expect(parseFilenameDate('2008-11-05 14:30')).toEqual(new Date(2008, 10, 5, 14, 30));
  });

  it('should reject out-of-range components', () => {
    expect(parseFilenameDate('2008-02-30')).toBeNull();
    expect(parseFilenameDate('2008-13-01')).toBeNull();
    expect(parseFilenameDate('2008-11-05 25:00')).toBeNull();
  });
});

describe('parsePostFilename', () => {
  it('should split date, slug and extension', () => {
    expect(parsePostFilename('2008-11-05-my-awesome-post.md')).toEqual({
      kind: 'parsed',
      date: new Date(2008, 10, 5),
      slug: 'my-awesome-post',
      extension: '.md',
      topics: [],
    });
  });

  it('should apply the time suffix', () => {
    const parsed = parsePostFilename('2008-11-05_09-15-morning.md');
    expect(parsed).toMatchObject({
      kind: 'parsed',
      date: new Date(2008, 10, 5, 9, 15),
      slug: 'morning',
    });
  });

  it('should keep dots inside the slug', () => {
    expect(parsePostFilename('2008-11-05-version-1.2.markdown')).toMatchObject({
      slug: 'version-1.2',
      extension: '.markdown',
    });
  });

  it('should collect topic directories', () => {
    expect(parsePostFilename('ruby/rails/2008-11-05-routes.md')).toMatchObject({
      kind: 'parsed',
      slug: 'routes',
      topics: ['ruby', 'rails'],
    });
  });

  it('should report names that do not match', () => {
    expect(parsePostFilename('notes.md')).toEqual({
      kind: 'invalid',
      reason: '"notes.md" does not match YYYY-MM-DD-slug.ext',
    });
  });

  it('should report impossible dates', () => {
    expect(parsePostFilename('2008-02-30-leap.md')).toEqual({
      kind: 'invalid',
      reason: '"2008-02-30" is not a valid date',
    });
  });
});
