/**
 * Token counting and truncation for embedding input
 *
 * Uses tiktoken's cl100k_base, the encoding of OpenAI's embedding models.
 */

import { get_encoding, Tiktoken } from 'tiktoken';
import * as logger from '../utils/logger';

/** Input limit of OpenAI's text-embedding-3 models */
export const DEFAULT_EMBEDDING_MAX_TOKENS = 8191;

// Encoding is expensive to initialize
let encoder: Tiktoken | null = null;

function getEncoder(): Tiktoken {
  if (!encoder) {
    encoder = get_encoding('cl100k_base');
    logger.debug('Tiktoken encoder initialized', { encoding: 'cl100k_base' });
  }
  return encoder;
}

export function countTokens(text: string): number {
  return getEncoder().encode(text).length;
}

/**
 * Cuts text down to at most `maxTokens` tokens
 */
export function truncateToTokens(text: string, maxTokens: number = DEFAULT_EMBEDDING_MAX_TOKENS): string {
  const enc = getEncoder();
  const tokens = enc.encode(text);
  if (tokens.length <= maxTokens) {
    return text;
  }

  logger.debug('Truncating embedding input', { tokens: tokens.length, maxTokens });

  // decode() returns UTF-8 bytes
  return new TextDecoder().decode(enc.decode(tokens.slice(0, maxTokens)));
}

/**
 * Frees the WASM encoder
 */
export function cleanup(): void {
  if (encoder) {
    encoder.free();
    encoder = null;
  }
}
