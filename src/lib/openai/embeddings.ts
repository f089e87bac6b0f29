/**
 * OpenAI embeddings generation with retry logic
 */

import OpenAI from 'openai';
import { getOpenAIClient, getEmbeddingModel } from './client';
import { RateLimitError, EmbeddingError, toError } from '../utils/errors';
import { trackDependency } from '../utils/telemetry';
import * as logger from '../utils/logger';

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the next attempt: the server's retry-after when given,
 * otherwise exponential backoff (1s, 2s, 4s)
 */
function retryDelay(error: InstanceType<typeof OpenAI.RateLimitError>, retryCount: number): number {
  const header = error.headers?.['retry-after'];
  const seconds = header ? parseInt(header, 10) : NaN;
  return Number.isNaN(seconds) ? BASE_DELAY_MS * Math.pow(2, retryCount) : seconds * 1000;
}

/**
 * Generates an embedding for the given text, retrying rate limits with backoff
 *
 * @param retryCount - Current retry attempt (used internally for recursion)
 * @throws RateLimitError if max retries exceeded
 * @throws EmbeddingError for other failures
 */
export async function generateEmbedding(
  content: string,
  retryCount = 0
): Promise<number[]> {
  const client = getOpenAIClient();
  const model = getEmbeddingModel();
  const startTime = Date.now();

  try {
    logger.debug('Generating embedding', {
      contentLength: content.length,
      model,
      retryCount,
    });

    const response = await client.embeddings.create({
      model,
      input: content,
      encoding_format: 'float',
    });

    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error('Embedding response contained no data');
    }

    trackDependency('embeddings.create', 'OpenAI API', model, Date.now() - startTime, true);

    return embedding;
  } catch (err) {
    trackDependency('embeddings.create', 'OpenAI API', model, Date.now() - startTime, false);

    if (err instanceof OpenAI.RateLimitError) {
      const retryAfter = retryDelay(err, retryCount);

      logger.warn('OpenAI rate limit hit', {
        retryCount,
        retryAfter,
        maxRetries: MAX_RETRIES,
      });

      if (retryCount < MAX_RETRIES) {
        await sleep(retryAfter);
        return generateEmbedding(content, retryCount + 1);
      }

      const rateLimitError = new RateLimitError(
        `OpenAI rate limit exceeded after ${MAX_RETRIES} retries`,
        retryAfter
      );
      logger.logError('Max retries exceeded for rate limit', rateLimitError);
      throw rateLimitError;
    }

    const embeddingError = new EmbeddingError('Failed to generate embedding', toError(err));
    logger.logError('Embedding generation failed', embeddingError, {
      errorStatus: err instanceof OpenAI.APIError ? err.status : undefined,
    });

    throw embeddingError;
  }
}
