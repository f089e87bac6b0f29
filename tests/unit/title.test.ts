/**
 * Unit tests for title extraction
 */

import {
  contentTypeFor,
  extractHeading,
  extractTitle,
  humanizeSlug,
} from '../../src/lib/post/title';

describe('contentTypeFor', () => {
  it('should recognize markdown extensions', () => {
    expect(contentTypeFor('.md')).toBe('markdown');
    expect(contentTypeFor('.markdown')).toBe('markdown');
    expect(contentTypeFor('.mkdn')).toBe('markdown');
  });

  it('should recognize textile', () => {
    expect(contentTypeFor('.textile')).toBe('textile');
  });

  it('should treat everything else as unknown', () => {
    expect(contentTypeFor('.html')).toBe('unknown');
    expect(contentTypeFor('.txt')).toBe('unknown');
  });
});

describe('extractHeading', () => {
  it('should find a leading ATX heading', () => {
    expect(extractHeading('# Hello World\n\nBody text', 'markdown')).toBe('Hello World');
  });

  it('should drop closing hashes', () => {
    expect(extractHeading('## Closed Heading ##\n', 'markdown')).toBe('Closed Heading');
  });

  it('should find a setext heading', () => {
    expect(extractHeading('Big Title\n=========\n\ntext', 'markdown')).toBe('Big Title');
  });

  it('should read an ATX heading whose text starts on the next line', () => {
    expect(extractHeading('#\nHello', 'markdown')).toBe('Hello');
  });

  it('should allow blank lines between a setext title and its underline', () => {
    expect(extractHeading('Title\n\n=====', 'markdown')).toBe('Title');
    expect(extractHeading('Spaced Out\n\n  ---\nbody', 'markdown')).toBe('Spaced Out');
  });

  it('should find a textile heading', () => {
    expect(extractHeading('h1. Textile Title\n\nbody', 'textile')).toBe('Textile Title');
    expect(extractHeading('h2.\nNext Line', 'textile')).toBe('Next Line');
  });

  it('should find nothing in unknown content', () => {
    expect(extractHeading('# Not A Heading Here', 'unknown')).toBeUndefined();
  });

  it('should find nothing in plain prose', () => {
    expect(extractHeading('Just a paragraph.', 'markdown')).toBeUndefined();
  });
});

describe('humanizeSlug', () => {
  it('should capitalize each word', () => {
    expect(humanizeSlug('my-great-post')).toBe('My Great Post');
    expect(humanizeSlug('hello-WORLD')).toBe('Hello World');
  });
});

describe('extractTitle', () => {
  it('should prefer the explicit title', () => {
    expect(extractTitle({ title: 'Explicit' }, '# Heading', 'markdown', 'slug')).toBe('Explicit');
  });

  it('should stringify non-string titles', () => {
    expect(extractTitle({ title: 2008 }, '', 'markdown', 'slug')).toBe('2008');
  });

  it('should fall back to the heading', () => {
    expect(extractTitle({}, '# From Heading\n', 'markdown', 'slug')).toBe('From Heading');
  });

  it('should fall back to the humanized slug', () => {
    expect(extractTitle({}, 'no heading here', 'markdown', 'my-great-post')).toBe('My Great Post');
  });
});
