/**
 * Custom error classes for the post engine
 */

import { types } from 'util';

/**
 * Error thrown when a post cannot be constructed from its source file
 * (unparseable filename date, malformed metadata)
 */
export class PostConstructionError extends Error {
  constructor(message: string, public postName: string, public originalError?: Error) {
    super(message);
    this.name = 'PostConstructionError';
    Object.setPrototypeOf(this, PostConstructionError.prototype);
  }
}

/**
 * Error thrown when rendering a post through its templates fails
 */
export class RenderError extends Error {
  constructor(message: string, public postId?: string, public originalError?: Error) {
    super(message);
    this.name = 'RenderError';
    Object.setPrototypeOf(this, RenderError.prototype);
  }
}

/**
 * Error thrown when writing rendered output to the destination fails
 */
export class WriteError extends Error {
  constructor(message: string, public path: string, public originalError?: Error) {
    super(message);
    this.name = 'WriteError';
    Object.setPrototypeOf(this, WriteError.prototype);
  }
}

/**
 * Error thrown for missing or invalid configuration
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when a similarity engine is given to a second related-post index
 */
export class SimilarityIndexError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'SimilarityIndexError';
    Object.setPrototypeOf(this, SimilarityIndexError.prototype);
  }
}

/**
 * Error thrown when OpenAI API rate limit is exceeded
 */
export class RateLimitError extends Error {
  constructor(message: string, public retryAfter?: number) {
    super(message);
    this.name = 'RateLimitError';
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

/**
 * Error thrown when embedding generation fails
 */
export class EmbeddingError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'EmbeddingError';
    Object.setPrototypeOf(this, EmbeddingError.prototype);
  }
}

/**
 * Error thrown when Pinecone operations fail
 */
export class VectorDatabaseError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'VectorDatabaseError';
    Object.setPrototypeOf(this, VectorDatabaseError.prototype);
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return types.isNativeError(value) ? value : new Error(String(value));
}

/**
 * Error raised by a Node API, e.g. `fs`, optionally with the given code.
 * Matches errors from any realm, so it also holds under test sandboxes.
 */
export function isNodeError(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (!types.isNativeError(error) || !('code' in error) || typeof error.code !== 'string') {
    return false;
  }
  return code === undefined || error.code === code;
}

export function isPostConstructionError(error: unknown): error is PostConstructionError {
  return error instanceof PostConstructionError;
}

export function isRenderError(error: unknown): error is RenderError {
  return error instanceof RenderError;
}

export function isWriteError(error: unknown): error is WriteError {
  return error instanceof WriteError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isSimilarityIndexError(error: unknown): error is SimilarityIndexError {
  return error instanceof SimilarityIndexError;
}

/**
 * Type guard to check if an error is a RateLimitError
 */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

export function isVectorDatabaseError(
  error: unknown
): error is VectorDatabaseError {
  return error instanceof VectorDatabaseError;
}
