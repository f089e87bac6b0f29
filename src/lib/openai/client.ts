/**
 * OpenAI client used for post embeddings
 */

import OpenAI from 'openai';
import { getConfig } from '../../types/config';
import * as logger from '../utils/logger';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

const REQUEST_TIMEOUT_MS = 30000;

let client: OpenAI | null = null;

/**
 * Embedding model named by OPENAI_MODEL
 */
export function getEmbeddingModel(): string {
  return getConfig('OPENAI_MODEL', DEFAULT_EMBEDDING_MODEL);
}

/**
 * Shared client, created on the first embedding request of a build.
 * SDK retries are off; generateEmbedding retries rate limits itself.
 */
export function getOpenAIClient(): OpenAI {
  if (client) {
    return client;
  }

  client = new OpenAI({
    apiKey: getConfig('OPENAI_API_KEY'),
    timeout: REQUEST_TIMEOUT_MS,
    maxRetries: 0,
  });
  logger.info('OpenAI client created', { model: getEmbeddingModel() });

  return client;
}
