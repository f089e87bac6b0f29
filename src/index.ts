/**
 * Library entry point
 */

export { Post, parseTimeOfDay } from './lib/post/post';
export type { PostOptions } from './lib/post/post';
export {
  FILENAME_PATTERN,
  isValidPostFilename,
  parsePostFilename,
  parseFilenameDate,
} from './lib/post/filename';
export type { ParsedFilename } from './lib/post/filename';
export { decodeFrontMatter, toMetadata } from './lib/post/frontMatter';
export { normalizeCategories, normalizeTags } from './lib/post/taxonomy';
export { extractTitle, extractHeading, humanizeSlug, contentTypeFor } from './lib/post/title';
export {
  PERMALINK_TEMPLATES,
  permalinkTemplate,
  expandPermalink,
  resolvePermalink,
  permalinkUrl,
  outputFilePath,
} from './lib/post/permalink';
export type { PermalinkStyle, PermalinkInput } from './lib/post/permalink';
export {
  comparePosts,
  sortPosts,
  nextPost,
  previousPost,
  createAdjacency,
} from './lib/post/ordering';
export * from './lib/related';
export { renderPost, buildRenderPayload } from './lib/render/pipeline';
export type { RenderContext } from './lib/render/pipeline';
export { deepMerge } from './lib/render/merge';
export { postPayload, postSummary } from './lib/render/postPayload';
export { LiquidTemplateEngine } from './lib/render/liquid';
export type { TemplateEngine } from './lib/render/templateEngine';
export { resolveLayoutChain } from './lib/render/layouts';
export { writePost } from './lib/render/writer';
export { buildSite } from './lib/site/build';
export type { BuildOptions, BuildResult } from './lib/site/build';
export { loadSiteConfig } from './lib/site/config';
export type { SiteConfig } from './lib/site/config';
export * from './lib/utils/errors';
export type * from './types/post';
export type * from './types/payload';
