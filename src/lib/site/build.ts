/**
 * Site build: read, order, index, render and write every post
 *
 * Posts are processed one after another. A post that fails to construct,
 * render or write is recorded and logged; the others still build.
 */

import { Post } from '../post/post';
import { createAdjacency, sortPosts } from '../post/ordering';
import { RelatedPostIndex, SimilarityEngine, createSimilarityEngine } from '../related';
import { LiquidTemplateEngine } from '../render/liquid';
import { renderPost } from '../render/pipeline';
import { TemplateEngine } from '../render/templateEngine';
import { writePost } from '../render/writer';
import { toError } from '../utils/errors';
import { trackMetric } from '../utils/telemetry';
import * as logger from '../utils/logger';
import { SiteConfig } from './config';
import { buildSitePayload } from './payload';
import { BuildFailure, POSTS_DIR, readLayouts, readPosts } from './reader';

export interface BuildOptions {
  /** Default: Liquid */
  templateEngine?: TemplateEngine;
  /** Overrides the engine chosen by `config.relatedPosts`; null for naive selection */
  similarityEngine?: SimilarityEngine<Post> | null;
  /** Build time exposed as `site.time` */
  now?: Date;
}

export interface BuildResult {
  /** Published posts read, oldest first */
  posts: Post[];
  /** Files written */
  written: string[];
  unpublished: number;
  failures: BuildFailure[];
  durationMs: number;
}

export async function buildSite(config: SiteConfig, options: BuildOptions = {}): Promise<BuildResult> {
  const startTime = Date.now();
  const templateEngine = options.templateEngine ?? new LiquidTemplateEngine();

  logger.info('Site build started', { source: config.source, destination: config.destination });

  const read = await readPosts(config.source, config.destination, {
    permalinkStyle: config.permalink,
    multiviews: config.multiviews,
    defaults: config.postDefaults,
  });
  const failures = [...read.failures];

  const posts = sortPosts(read.posts);
  const candidates = [...posts].reverse();
  const layouts = await readLayouts(config.source);
  const sitePayload = buildSitePayload(config, posts, options.now ?? new Date());

  const engine =
    options.similarityEngine !== undefined
      ? options.similarityEngine
      : createSimilarityEngine<Post>(config.relatedPosts, config.embeddingMaxTokens);

  // Every post goes into the index before the first render queries it
  const relatedIndex =
    engine && candidates.length > 1 ? await RelatedPostIndex.build(engine, candidates) : undefined;

  const adjacency = createAdjacency(posts);
  const written: string[] = [];

  try {
    for (const post of posts) {
      const file = `${post.dir ? `${post.dir}/` : ''}${POSTS_DIR}/${post.name}`;
      try {
        await renderPost(post, layouts, sitePayload, {
          engine: templateEngine,
          posts,
          candidates,
          relatedIndex,
          adjacency,
        });
        written.push(await writePost(post, config.destination));
      } catch (err) {
        const error = toError(err);
        logger.logError(`Failed to build post ${file}`, error, { identifier: post.identifier });
        failures.push({ file, error });
      }
    }
  } finally {
    await relatedIndex?.close();
  }

  const durationMs = Date.now() - startTime;

  logger.info('Site build completed', {
    posts: posts.length,
    written: written.length,
    unpublished: read.unpublished,
    failed: failures.length,
    durationMs,
  });
  trackMetric('build.posts_written', written.length);
  trackMetric('build.posts_failed', failures.length);

  return { posts, written, unpublished: read.unpublished, failures, durationMs };
}
