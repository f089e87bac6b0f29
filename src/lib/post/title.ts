/**
 * Title extraction: explicit front matter title, then the first heading of the
 * content, then the humanized slug.
 */

import { ContentType, Metadata } from '../../types/post';
import { scalarToString } from './frontMatter';

/** `# Title` with optional closing hashes */
const MARKDOWN_ATX_HEADING = /^\s*#+\s*(.+?)[ \t]*#*[ \t]*(?:\r?\n|$)/;

/** `Title` underlined by a line of `=` or `-`, blank lines allowed between */
const MARKDOWN_SETEXT_HEADING = /^\s*(\S.*?)[ \t]*\r?\n\s*(?:-+|=+)[ \t]*(?:\r?\n|$)/;

/** `h1. Title` */
const TEXTILE_HEADING = /^\s*h\d\.\s*(.+)/;

/**
 * Maps a file extension to the content type used for heading detection and conversion
 */
export function contentTypeFor(extension: string): ContentType {
  const ext = extension.replace(/^\./, '');
  if (/textile/i.test(ext)) {
    return 'textile';
  }
  if (/markdown|mkdn|md|mkd/i.test(ext)) {
    return 'markdown';
  }
  return 'unknown';
}

/**
 * Finds a leading heading in the content, if the content type has one
 */
export function extractHeading(content: string, contentType: ContentType): string | undefined {
  let match: RegExpExecArray | null = null;

  switch (contentType) {
    case 'markdown':
      match = MARKDOWN_ATX_HEADING.exec(content) ?? MARKDOWN_SETEXT_HEADING.exec(content);
      break;
    case 'textile':
      match = TEXTILE_HEADING.exec(content);
      break;
    case 'unknown':
      break;
  }

  const heading = match?.[1].trim();
  return heading ? heading : undefined;
}

/**
 * "my-great-post" -> "My Great Post"
 */
export function humanizeSlug(slug: string): string {
  return slug
    .split('-')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Derives the display title of a post. Total: always returns a string.
 */
export function extractTitle(
  metadata: Metadata,
  content: string,
  contentType: ContentType,
  slug: string
): string {
  return (
    scalarToString(metadata.title) ??
    extractHeading(content, contentType) ??
    humanizeSlug(slug)
  );
}
