/**
 * Environment variable configuration
 */

import { ConfigurationError } from '../lib/utils/errors';

export interface EnvironmentConfig {
  // Site
  SITE_SOURCE?: string;
  SITE_DESTINATION?: string;
  PERMALINK_STYLE?: string;
  MULTIVIEWS?: string;
  RELATED_POSTS?: string;
  LOG_LEVEL?: string;

  // OpenAI
  OPENAI_API_KEY?: string;
  OPENAI_MODEL?: string;
  EMBEDDING_MAX_TOKENS?: string;

  // Pinecone
  PINECONE_API_KEY?: string;
  PINECONE_HOST?: string;
  PINECONE_INDEX?: string;

  // Monitoring
  SENTRY_DSN?: string;
  SENTRY_ENVIRONMENT?: string;
  SENTRY_RELEASE?: string;
  APPLICATIONINSIGHTS_CONNECTION_STRING?: string;
}

/**
 * How related posts are chosen.
 *
 * - `naive`: the first ten other posts
 * - `embeddings`: in-memory cosine similarity over OpenAI embeddings
 * - `pinecone`: OpenAI embeddings stored and queried in a Pinecone index
 */
export type RelatedPostsMode = 'naive' | 'embeddings' | 'pinecone';

export const RELATED_POSTS_MODES: readonly RelatedPostsMode[] = ['naive', 'embeddings', 'pinecone'];

export function isRelatedPostsMode(value: string): value is RelatedPostsMode {
  return (RELATED_POSTS_MODES as readonly string[]).includes(value);
}

/**
 * Validates that the environment variables needed by the related-posts mode are set
 * @throws ConfigurationError if any required variable is missing
 */
export function validateConfig(mode: RelatedPostsMode): void {
  const required: (keyof EnvironmentConfig)[] = [];

  if (mode === 'embeddings' || mode === 'pinecone') {
    required.push('OPENAI_API_KEY');
  }
  if (mode === 'pinecone') {
    required.push('PINECONE_API_KEY', 'PINECONE_HOST', 'PINECONE_INDEX');
  }

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`
    );
  }
}

/**
 * Gets configuration value from environment with default fallback
 */
export function getConfig<K extends keyof EnvironmentConfig>(
  key: K,
  defaultValue?: string
): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(`Environment variable ${key} is not set`);
  }
  return value;
}

/**
 * Reads a boolean flag from the environment ("1", "true", "yes", "on")
 */
export function getFlag<K extends keyof EnvironmentConfig>(key: K): boolean | undefined {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}
