/**
 * Body conversion by content type
 */

import { marked } from 'marked';
import { ContentType } from '../../types/post';
import { RenderError } from '../utils/errors';

/**
 * Converts a rendered post body to HTML. Markdown goes through marked;
 * Textile and unknown types are emitted unchanged.
 */
export function convertContent(contentType: ContentType, content: string): string {
  switch (contentType) {
    case 'markdown': {
      const html = marked.parse(content, { async: false });
      if (typeof html !== 'string') {
        throw new RenderError('Markdown conversion returned a promise');
      }
      return html;
    }
    case 'textile':
    case 'unknown':
      return content;
  }
}
