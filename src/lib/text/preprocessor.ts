/**
 * Text preprocessing of post bodies before embedding
 *
 * Handles:
 * - Liquid tags and output blocks
 * - Fenced code blocks and inline HTML
 * - Markdown links, images and heading markers
 * - Multiple newlines and whitespace normalization
 */

import * as logger from '../utils/logger';

/**
 * Reduces a post body to the plain prose an embedding model should see
 *
 * @param content - Raw post body (Markdown, Textile or HTML with Liquid)
 * @returns Cleaned and normalized text
 */
export function preprocessContent(content: string): string {
  if (!content) {
    return '';
  }

  let processed = content;

  // Step 1: Normalize line endings (Windows CRLF -> Unix LF)
  processed = processed.replace(/\r\n/g, '\n');

  // Step 2: Drop Liquid markup; highlight blocks go with their contents
  processed = processed.replace(/\{%\s*highlight[\s\S]*?\{%\s*endhighlight\s*%\}/g, '[code block]');
  processed = processed.replace(/\{%[\s\S]*?%\}/g, '');
  processed = processed.replace(/\{\{[\s\S]*?\}\}/g, '');

  // Step 3: Keep the presence of code blocks but not their contents
  processed = processed.replace(/```[\s\S]*?```/g, '[code block]');
  processed = processed.replace(/<pre[\s\S]*?<\/pre>/gi, '[code block]');

  // Step 4: Markdown images disappear, links keep their text
  processed = processed.replace(/!\[[^\]]*\]\([^)]*\)/g, '');
  processed = processed.replace(/\[([^\]]+)\]\([^)]*\)/g, '$1');

  // Step 5: Strip remaining HTML tags
  processed = processed.replace(/<\/?[a-z][^>]*>/gi, '');

  // Step 6: Simplify bare URLs while preserving context
  processed = processed.replace(/https?:\/\/([^\s]+)/gi, (_match, rest: string) => {
    const domain = rest.split('/')[0];
    return `[link: ${domain}]`;
  });

  // Step 7: Heading markers and Textile block signatures
  processed = processed.replace(/^[ \t]*#{1,6}[ \t]*/gm, '');
  processed = processed.replace(/^[ \t]*(?:h\d|p|bq)\.[ \t]+/gm, '');

  // Step 8: Normalize whitespace (but preserve paragraph breaks)
  processed = processed.replace(/\n{3,}/g, '\n\n');
  processed = processed.replace(/ {2,}/g, ' ');
  processed = processed
    .split('\n')
    .map((line) => line.trim())
    .join('\n');
  processed = processed.replace(/\n{3,}/g, '\n\n');

  processed = processed.trim();

  logger.debug('Content preprocessed', {
    originalLength: content.length,
    processedLength: processed.length,
  });

  return processed;
}

/**
 * Whether preprocessed text has enough substance to embed
 */
export function isValidContent(content: string): boolean {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    return false;
  }

  // Mostly punctuation or placeholders is not worth an embedding call
  const wordCharacters = trimmed.replace(/[^\p{L}\p{N}]/gu, '').length;
  return wordCharacters >= 3;
}

/**
 * Extracts a preview of the content for logging
 *
 * @param maxLength - Maximum preview length (default: 100)
 */
export function getContentPreview(content: string, maxLength = 100): string {
  if (!content) {
    return '[empty]';
  }

  const preview = content.trim().substring(0, maxLength);
  return preview.length < content.trim().length ? `${preview}...` : preview;
}
