/**
 * Site configuration
 *
 * Layered: built-in defaults, then `_config.yml` in the source directory,
 * then environment variables, then explicit overrides (CLI arguments).
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { Metadata } from '../../types/post';
import {
  RelatedPostsMode,
  getConfig,
  getFlag,
  isRelatedPostsMode,
} from '../../types/config';
import { PermalinkStyle } from '../post/permalink';
import { scalarToString, toMetadata } from '../post/frontMatter';
import { isMapping } from '../render/merge';
import { DEFAULT_EMBEDDING_MAX_TOKENS } from '../text/tokens';
import { ConfigurationError, isNodeError, toError } from '../utils/errors';
import * as logger from '../utils/logger';

export const CONFIG_FILE = '_config.yml';

export interface SiteConfig {
  source: string;
  destination: string;
  permalink: PermalinkStyle;
  /** Extensionless URLs: drop ".html" from post URLs */
  multiviews: boolean;
  relatedPosts: RelatedPostsMode;
  /** Front matter every post starts from */
  postDefaults: Metadata;
  embeddingMaxTokens: number;
  /** Remaining `_config.yml` keys, exposed to templates under `site` */
  extra: Metadata;
}

/** Keys of `_config.yml` consumed by the engine itself */
const KNOWN_KEYS = new Set([
  'source',
  'destination',
  'permalink',
  'multiviews',
  'related_posts',
  'lsi',
  'post_defaults',
  'embedding_max_tokens',
]);

/**
 * Reads `_config.yml`; a missing file is an empty configuration
 *
 * @throws ConfigurationError when the file is not a YAML mapping
 */
export async function readConfigFile(source: string): Promise<Metadata> {
  const file = path.join(source, CONFIG_FILE);

  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (err) {
    if (isNodeError(err, 'ENOENT')) {
      logger.debug('No configuration file', { file });
      return {};
    }
    throw new ConfigurationError(`Cannot read ${file}: ${toError(err).message}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML in ${file}: ${toError(err).message}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError(`${file} must contain a mapping`);
  }
  return toMetadata(parsed);
}

function parseRelatedPosts(value: string, origin: string): RelatedPostsMode {
  if (!isRelatedPostsMode(value)) {
    throw new ConfigurationError(`${origin} must be naive, embeddings or pinecone (got "${value}")`);
  }
  return value;
}

function parsePositiveInteger(value: string, origin: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${origin} must be a positive integer (got "${value}")`);
  }
  return parsed;
}

/**
 * Resolves the configuration of the site rooted at `source`
 */
export async function loadSiteConfig(
  source: string = getConfig('SITE_SOURCE', '.'),
  overrides: Partial<SiteConfig> = {}
): Promise<SiteConfig> {
  const root = path.resolve(source);
  const file = await readConfigFile(root);

  let relatedPosts: RelatedPostsMode = file.lsi === true ? 'embeddings' : 'naive';
  const fileRelated = scalarToString(file.related_posts);
  if (fileRelated !== undefined) {
    relatedPosts = parseRelatedPosts(fileRelated, `${CONFIG_FILE} related_posts`);
  }
  const envRelated = getConfig('RELATED_POSTS', '');
  if (envRelated) {
    relatedPosts = parseRelatedPosts(envRelated, 'RELATED_POSTS');
  }

  const maxTokensText = getConfig('EMBEDDING_MAX_TOKENS', '') || scalarToString(file.embedding_max_tokens);
  const postDefaults = file.post_defaults;

  const extra: Metadata = {};
  for (const [key, value] of Object.entries(file)) {
    if (!KNOWN_KEYS.has(key)) {
      extra[key] = value;
    }
  }

  const config: SiteConfig = {
    source: root,
    destination: path.resolve(
      root,
      getConfig('SITE_DESTINATION', '') || scalarToString(file.destination) || '_site'
    ),
    permalink: getConfig('PERMALINK_STYLE', '') || scalarToString(file.permalink) || 'date',
    multiviews: getFlag('MULTIVIEWS') ?? file.multiviews === true,
    relatedPosts,
    postDefaults: postDefaults !== undefined && isMapping(postDefaults) ? toMetadata(postDefaults) : {},
    embeddingMaxTokens: maxTokensText
      ? parsePositiveInteger(maxTokensText, 'embedding_max_tokens')
      : DEFAULT_EMBEDDING_MAX_TOKENS,
    extra,
  };

  const resolved: SiteConfig = { ...config, ...overrides };

  logger.info('Site configuration loaded', {
    source: resolved.source,
    destination: resolved.destination,
    permalink: resolved.permalink,
    multiviews: resolved.multiviews,
    relatedPosts: resolved.relatedPosts,
  });

  return resolved;
}
