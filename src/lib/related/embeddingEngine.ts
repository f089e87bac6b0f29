/**
 * In-memory similarity engine over text embeddings
 *
 * Each post is embedded once when added; a query reuses the vector of text
 * already embedded, embeds anything else, and ranks every stored post by
 * cosine similarity.
 */

import { generateEmbedding } from '../openai/embeddings';
import { preprocessContent, isValidContent, getContentPreview } from '../text/preprocessor';
import { truncateToTokens, DEFAULT_EMBEDDING_MAX_TOKENS } from '../text/tokens';
import * as logger from '../utils/logger';
import { Embedder, Indexable, SimilarityEngine } from './similarityEngine';

export interface EmbeddingEngineOptions {
  /** Default: OpenAI embeddings */
  embed?: Embedder;
  /** Token limit of the embedding model input */
  maxTokens?: number;
}

interface Entry<T> {
  item: T;
  vector: number[];
}

/**
 * Cosine similarity; 0 when either vector is empty, zero or the lengths differ
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Prepares post text for an embedding call: plain text, within the token limit.
 * Returns null when nothing worth embedding is left.
 */
export function prepareEmbeddingInput(content: string, maxTokens: number): string | null {
  const text = preprocessContent(content);
  if (!isValidContent(text)) {
    return null;
  }
  return truncateToTokens(text, maxTokens);
}

export class EmbeddingSimilarityEngine<T extends Indexable> implements SimilarityEngine<T> {
  private readonly entries: Entry<T>[] = [];
  // Keyed by embedding input
  private readonly vectors = new Map<string, number[]>();
  private readonly embed: Embedder;
  private readonly maxTokens: number;

  constructor(options: EmbeddingEngineOptions = {}) {
    this.embed = options.embed ?? ((text) => generateEmbedding(text));
    this.maxTokens = options.maxTokens ?? DEFAULT_EMBEDDING_MAX_TOKENS;
  }

  get size(): number {
    return this.entries.length;
  }

  private async vectorFor(content: string): Promise<number[]> {
    const input = prepareEmbeddingInput(content, this.maxTokens);
    if (input === null) {
      logger.debug('Skipping embedding for empty content', {
        preview: getContentPreview(content),
      });
      return [];
    }

    const known = this.vectors.get(input);
    if (known) {
      return known;
    }
    const vector = await this.embed(input);
    this.vectors.set(input, vector);
    return vector;
  }

  async add(item: T): Promise<void> {
    const vector = await this.vectorFor(item.content);
    this.entries.push({ item, vector });

    logger.debug('Post indexed', {
      identifier: item.identifier,
      dimensions: vector.length,
    });
  }

  async query(content: string, k: number): Promise<T[]> {
    const vector = await this.vectorFor(content);

    // Stable sort: equal scores keep insertion order
    return this.entries
      .map((entry) => ({ item: entry.item, score: cosineSimilarity(vector, entry.vector) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, k))
      .map((scored) => scored.item);
  }
}
