/**
 * Render pipeline
 *
 * Builds a post's payload, renders its body through the template engine,
 * converts it by content type and wraps it in its layout chain. Performs no
 * I/O; the result is stored on the post.
 */

import { LayoutMap, Payload } from '../../types/payload';
import { ContentType } from '../../types/post';
import { Post } from '../post/post';
import { Adjacency, createAdjacency } from '../post/ordering';
import { RelatedPostIndex, selectRelatedPosts } from '../related';
import { RenderError, isRenderError, toError } from '../utils/errors';
import * as logger from '../utils/logger';
import { convertContent } from './converter';
import { resolveLayoutChain } from './layouts';
import { deepMerge } from './merge';
import { postPayload, postSummary } from './postPayload';
import { TemplateEngine } from './templateEngine';

export interface RenderContext {
  engine: TemplateEngine;
  /** All posts, oldest first; source of next/previous */
  posts: readonly Post[];
  /** Related-post candidates; defaults to `posts` newest first */
  candidates?: readonly Post[];
  /** Similarity index; without it related posts are chosen naively */
  relatedIndex?: RelatedPostIndex<Post>;
  /** Precomputed positions in `posts` */
  adjacency?: Adjacency<Post>;
  convert?: (contentType: ContentType, content: string) => string;
}

/**
 * The payload a post's body is rendered with.
 *
 * The page payload is merged into the site payload with site-wide values
 * winning on a scalar collision; mappings such as `site` merge key by key,
 * so `site.related_posts` sits beside the site-wide keys.
 */
export async function buildRenderPayload(
  post: Post,
  sitePayload: Payload,
  context: RenderContext
): Promise<Payload> {
  const candidates = context.candidates ?? [...context.posts].reverse();
  const adjacency = context.adjacency ?? createAdjacency(context.posts);
  const related = await selectRelatedPosts(post, candidates, context.relatedIndex);

  const pagePayload: Payload = {
    site: { related_posts: related.map(postSummary) },
    page: postPayload(post, adjacency),
  };

  return {
    ...deepMerge(pagePayload, sitePayload),
    content_type: post.contentType,
  };
}

async function renderTemplate(
  engine: TemplateEngine,
  template: string,
  payload: Payload,
  what: string,
  post: Post
): Promise<string> {
  try {
    return await engine.render(template, payload);
  } catch (err) {
    throw new RenderError(`Failed to render ${what} of ${post.identifier}`, post.identifier, toError(err));
  }
}

/**
 * Renders a post into its final output and stores it on the post
 *
 * @throws RenderError when a template fails or the layout chain loops
 */
export async function renderPost(
  post: Post,
  layouts: LayoutMap,
  sitePayload: Payload,
  context: RenderContext
): Promise<string> {
  const convert = context.convert ?? convertContent;
  let payload = await buildRenderPayload(post, sitePayload, context);

  const body = await renderTemplate(context.engine, post.content, payload, 'content', post);

  let output: string;
  try {
    output = convert(post.contentType, body);
  } catch (err) {
    throw isRenderError(err)
      ? err
      : new RenderError(`Failed to convert ${post.contentType} of ${post.identifier}`, post.identifier, toError(err));
  }

  const chain = resolveLayoutChain(layouts, post.frontMatter.layout);
  for (const layout of chain) {
    payload = deepMerge(payload, { content: output, page: layout.data });
    output = await renderTemplate(context.engine, layout.content, payload, `layout "${layout.name}"`, post);
  }

  logger.debug('Post rendered', {
    identifier: post.identifier,
    layouts: chain.map((layout) => layout.name),
    outputLength: output.length,
  });

  post.setOutput(output);
  return output;
}
