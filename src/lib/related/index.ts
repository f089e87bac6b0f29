/**
 * Related posts module exports
 */

import { RelatedPostsMode } from '../../types/config';
import { EmbeddingSimilarityEngine } from './embeddingEngine';
import { PineconeSimilarityEngine } from './pineconeEngine';
import { Indexable, SimilarityEngine } from './similarityEngine';

export { selectRelatedPosts, MAX_RELATED_POSTS } from './selector';
export { RelatedPostIndex } from './relatedIndex';
export { EmbeddingSimilarityEngine, cosineSimilarity, prepareEmbeddingInput } from './embeddingEngine';
export { PineconeSimilarityEngine } from './pineconeEngine';
export type { VectorIndex, VectorNamespace } from './pineconeEngine';
export type { Embedder, Indexable, SimilarityEngine } from './similarityEngine';

/**
 * The engine for a related-posts mode; `naive` needs none
 */
export function createSimilarityEngine<T extends Indexable>(
  mode: RelatedPostsMode,
  maxTokens?: number
): SimilarityEngine<T> | null {
  switch (mode) {
    case 'naive':
      return null;
    case 'embeddings':
      return new EmbeddingSimilarityEngine<T>({ maxTokens });
    case 'pinecone':
      return new PineconeSimilarityEngine<T>({ maxTokens });
  }
}
