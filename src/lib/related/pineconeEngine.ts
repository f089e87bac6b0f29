/**
 * Similarity engine backed by a Pinecone index
 *
 * Each engine writes to its own namespace, under the post identifiers, so a
 * build only ever matches its own posts. Pinecone makes upserts visible with a
 * delay: `ready` polls the namespace's record count until every upsert shows,
 * and `close` deletes the namespace.
 */

import { randomUUID } from 'crypto';
import { Index } from '@pinecone-database/pinecone';
import { getPineconeIndex } from '../pinecone/client';
import { generateEmbedding } from '../openai/embeddings';
import { DEFAULT_EMBEDDING_MAX_TOKENS } from '../text/tokens';
import { VectorDatabaseError, toError } from '../utils/errors';
import { trackDependency } from '../utils/telemetry';
import * as logger from '../utils/logger';
import { prepareEmbeddingInput } from './embeddingEngine';
import { Embedder, Indexable, SimilarityEngine } from './similarityEngine';

const DEFAULT_POLL_INTERVAL_MS = 1000;
const DEFAULT_READY_TIMEOUT_MS = 60000;

/**
 * The part of a Pinecone namespace this engine calls
 */
export type VectorNamespace = Pick<Index, 'upsert' | 'query' | 'deleteAll'>;

/**
 * The part of a Pinecone index this engine calls
 */
export interface VectorIndex {
  namespace(name: string): VectorNamespace;
  describeIndexStats: Index['describeIndexStats'];
}

export interface PineconeEngineOptions {
  /** Default: the index named by PINECONE_INDEX / PINECONE_HOST */
  index?: VectorIndex;
  /** Default: `build-<uuid>`, new for every engine */
  namespace?: string;
  /** Default: OpenAI embeddings */
  embed?: Embedder;
  maxTokens?: number;
  /** Delay between record-count checks in `ready` */
  pollIntervalMs?: number;
  /** How long `ready` waits for the upserts to show */
  readyTimeoutMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class PineconeSimilarityEngine<T extends Indexable> implements SimilarityEngine<T> {
  readonly namespace: string;
  private readonly items = new Map<string, T>();
  // Keyed by embedding input
  private readonly vectorCache = new Map<string, number[]>();
  private readonly embed: Embedder;
  private readonly maxTokens: number;
  private readonly pollIntervalMs: number;
  private readonly readyTimeoutMs: number;
  private index: VectorIndex | undefined;
  private upserted = 0;

  constructor(options: PineconeEngineOptions = {}) {
    this.index = options.index;
    this.namespace = options.namespace ?? `build-${randomUUID()}`;
    this.embed = options.embed ?? ((text) => generateEmbedding(text));
    this.maxTokens = options.maxTokens ?? DEFAULT_EMBEDDING_MAX_TOKENS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.readyTimeoutMs = options.readyTimeoutMs ?? DEFAULT_READY_TIMEOUT_MS;
  }

  private getIndex(): VectorIndex {
    if (!this.index) {
      this.index = getPineconeIndex();
    }
    return this.index;
  }

  private vectors(): VectorNamespace {
    return this.getIndex().namespace(this.namespace);
  }

  private async embedCached(input: string): Promise<number[]> {
    const known = this.vectorCache.get(input);
    if (known) {
      return known;
    }
    const vector = await this.embed(input);
    this.vectorCache.set(input, vector);
    return vector;
  }

  async add(item: T): Promise<void> {
    const input = prepareEmbeddingInput(item.content, this.maxTokens);
    if (input === null) {
      logger.debug('Not upserting post without content', { identifier: item.identifier });
      return;
    }

    const values = await this.embedCached(input);
    const startTime = Date.now();

    try {
      await this.vectors().upsert([{ id: item.identifier, values }]);
      trackDependency('upsert', 'Pinecone', item.identifier, Date.now() - startTime, true);
    } catch (err) {
      const error = toError(err);
      trackDependency('upsert', 'Pinecone', item.identifier, Date.now() - startTime, false);
      logger.logError('Failed to upsert vector', error, { vectorId: item.identifier });
      throw new VectorDatabaseError(`Failed to upsert vector ${item.identifier}`, error);
    }

    this.items.set(item.identifier, item);
    this.upserted++;
    logger.debug('Vector upserted', { vectorId: item.identifier, dimensions: values.length });
  }

  private async recordCount(): Promise<number> {
    const startTime = Date.now();
    try {
      const stats = await this.getIndex().describeIndexStats();
      trackDependency('describeIndexStats', 'Pinecone', this.namespace, Date.now() - startTime, true);
      return stats.namespaces?.[this.namespace]?.recordCount ?? 0;
    } catch (err) {
      const error = toError(err);
      trackDependency('describeIndexStats', 'Pinecone', this.namespace, Date.now() - startTime, false);
      logger.logError('Failed to read index stats', error, { namespace: this.namespace });
      throw new VectorDatabaseError('Failed to read index stats', error);
    }
  }

  /**
   * @throws VectorDatabaseError when the upserts do not all show within the timeout
   */
  async ready(): Promise<void> {
    if (this.upserted === 0) {
      return;
    }

    const deadline = Date.now() + this.readyTimeoutMs;
    let records = await this.recordCount();

    while (records < this.upserted) {
      if (Date.now() >= deadline) {
        throw new VectorDatabaseError(
          `Namespace ${this.namespace} shows ${records} of ${this.upserted} vectors after ${this.readyTimeoutMs} ms`
        );
      }
      logger.debug('Waiting for upserted vectors', {
        namespace: this.namespace,
        records,
        expected: this.upserted,
      });
      await sleep(this.pollIntervalMs);
      records = await this.recordCount();
    }

    logger.info('Pinecone namespace ready', { namespace: this.namespace, records });
  }

  async query(content: string, k: number): Promise<T[]> {
    const input = prepareEmbeddingInput(content, this.maxTokens);
    if (input === null || k <= 0) {
      return [];
    }

    const vector = await this.embedCached(input);
    const startTime = Date.now();

    try {
      const response = await this.vectors().query({ vector, topK: k });
      trackDependency('query', 'Pinecone', `topK=${k}`, Date.now() - startTime, true);

      const related: T[] = [];
      for (const match of response.matches ?? []) {
        const item = this.items.get(match.id);
        if (item) {
          related.push(item);
        }
      }

      logger.debug('Pinecone query completed', {
        matches: response.matches?.length ?? 0,
        known: related.length,
      });

      return related;
    } catch (err) {
      const error = toError(err);
      trackDependency('query', 'Pinecone', `topK=${k}`, Date.now() - startTime, false);
      logger.logError('Failed to query vectors', error);
      throw new VectorDatabaseError('Failed to query vectors', error);
    }
  }

  async close(): Promise<void> {
    if (this.upserted === 0) {
      return;
    }

    const startTime = Date.now();
    try {
      await this.vectors().deleteAll();
      trackDependency('deleteAll', 'Pinecone', this.namespace, Date.now() - startTime, true);
      logger.debug('Pinecone namespace deleted', { namespace: this.namespace });
    } catch (err) {
      const error = toError(err);
      trackDependency('deleteAll', 'Pinecone', this.namespace, Date.now() - startTime, false);
      throw new VectorDatabaseError(`Failed to delete namespace ${this.namespace}`, error);
    }
  }
}
