/**
 * Related-post index shared by every selection of one build
 *
 * Built once by the build driver before any post renders: every post is
 * added, one after the other, before the first query can be issued. Each
 * render then queries the same instance. A post the engine fails to index is
 * logged and left out; the others still are. The build waits for the engine
 * to report every added post as queryable.
 */

import { SimilarityIndexError, toError } from '../utils/errors';
import { trackMetric } from '../utils/telemetry';
import * as logger from '../utils/logger';
import { Indexable, SimilarityEngine } from './similarityEngine';

// An engine holds the items it was given; it backs at most one index
const usedEngines = new WeakSet<object>();

export class RelatedPostIndex<T extends Indexable> {
  private constructor(
    private readonly engine: SimilarityEngine<T>,
    readonly size: number,
    /** Identifiers of the posts the engine failed to index */
    readonly skipped: readonly string[]
  ) {}

  /**
   * Adds every post to the engine and returns the ready index
   *
   * @throws SimilarityIndexError when the engine already backs an index
   */
  static async build<T extends Indexable>(
    engine: SimilarityEngine<T>,
    posts: readonly T[]
  ): Promise<RelatedPostIndex<T>> {
    if (usedEngines.has(engine)) {
      throw new SimilarityIndexError('Similarity engine has already been populated');
    }
    usedEngines.add(engine);

    const startTime = Date.now();
    logger.info('Building related-post index', { posts: posts.length });

    const skipped: string[] = [];
    for (const post of posts) {
      try {
        await engine.add(post);
      } catch (err) {
        logger.logError('Failed to index post', toError(err), { identifier: post.identifier });
        skipped.push(post.identifier);
      }
    }

    if (engine.ready) {
      try {
        await engine.ready();
      } catch (err) {
        await closeEngine(engine);
        throw err;
      }
    }

    const duration = Date.now() - startTime;
    const size = posts.length - skipped.length;
    logger.info('Related-post index built', {
      posts: size,
      skipped: skipped.length,
      durationMs: duration,
    });
    trackMetric('related_index.build_ms', duration);
    trackMetric('related_index.posts_skipped', skipped.length);

    return new RelatedPostIndex(engine, size, skipped);
  }

  query(content: string, k: number): Promise<T[]> {
    return this.engine.query(content, k);
  }

  /**
   * Releases the engine once the build no longer queries it; failures are logged
   */
  close(): Promise<void> {
    return closeEngine(this.engine);
  }
}

async function closeEngine<T extends Indexable>(engine: SimilarityEngine<T>): Promise<void> {
  if (!engine.close) {
    return;
  }
  try {
    await engine.close();
  } catch (err) {
    logger.logError('Failed to close similarity engine', toError(err));
  }
}
