/**
 * Unit tests for text preprocessor
 */

jest.mock('../../src/lib/utils/logger');

import { preprocessContent, isValidContent, getContentPreview } from '../../src/lib/text/preprocessor';

describe('preprocessContent', () => {
  it('should preserve non-ASCII characters', () => {
    const content = 'Über die Dämmung müssen wir reden.';
    expect(preprocessContent(content)).toBe(content);
  });

  it('should normalize line endings', () => {
    expect(preprocessContent('Line 1\r\nLine 2\r\nLine 3')).toBe('Line 1\nLine 2\nLine 3');
  });

  it('should replace highlight blocks', () => {
    const content = 'Intro\r\n{% highlight ruby %}\nputs 1\n{% endhighlight %}\nOutro';
    expect(preprocessContent(content)).toBe('Intro\n[code block]\nOutro');
  });

  it('should strip other Liquid markup', () => {
    expect(preprocessContent('{{ page.title }} text {% include footer.html %}')).toBe('text');
  });

  it('should replace fenced code', () => {
    expect(preprocessContent('Before\n```\nconst x = 1;\n```\nAfter')).toBe('Before\n[code block]\nAfter');
  });

  it('should drop images and keep link text', () => {
    expect(preprocessContent('Read [the docs](http://example.com/docs) ![alt](i.png) now')).toBe(
      'Read the docs now'
    );
  });

  it('should simplify URLs', () => {
    const content = 'Check out https://example.com/very/long/path?param=value for more info.';
    expect(preprocessContent(content)).toBe('Check out [link: example.com] for more info.');
  });

  it('should strip heading markers', () => {
    expect(preprocessContent('## Title\nh2. Other\nbody')).toBe('Title\nOther\nbody');
  });

  it('should normalize multiple newlines', () => {
    expect(preprocessContent('One\n\n\n\nTwo')).toBe('One\n\nTwo');
  });

  it('should handle empty content', () => {
    expect(preprocessContent('')).toBe('');
  });
});

describe('isValidContent', () => {
  it('should require three letters or digits', () => {
    expect(isValidContent('abc')).toBe(true);
    expect(isValidContent('ab')).toBe(false);
    expect(isValidContent('... !!')).toBe(false);
    expect(isValidContent('   ')).toBe(false);
  });
});

describe('getContentPreview', () => {
  it('should truncate long content', () => {
    expect(getContentPreview('abcdef', 3)).toBe('abc...');
  });

  it('should keep short content', () => {
    expect(getContentPreview('  abc  ', 10)).toBe('abc');
  });

  it('should mark empty content', () => {
    expect(getContentPreview('')).toBe('[empty]');
  });
});
