/**
 * Post entity
 *
 * A post is one dated file under a `_posts` folder. Everything about it is
 * resolved at construction: filename parse, metadata (site defaults overlaid
 * by front matter), title, publish flag, categories and tags.
 */

import * as path from 'path';
import { ContentType, FrontMatter, Metadata, PostSource } from '../../types/post';
import { PostConstructionError, RenderError } from '../utils/errors';
import { parsePostFilename } from './filename';
import { decodeFrontMatter } from './frontMatter';
import {
  PermalinkStyle,
  outputFilePath,
  permalinkTemplate,
  permalinkUrl,
  resolvePermalink,
} from './permalink';
import { normalizeCategories, normalizeTags } from './taxonomy';
import { contentTypeFor, extractTitle } from './title';

export interface PostOptions {
  /** Default: "date" */
  permalinkStyle?: PermalinkStyle;
  /** Drop ".html" from URLs */
  multiviews?: boolean;
  /** Site-wide front matter defaults, overridden by each post's own */
  defaults?: Metadata;
}

/**
 * Parses a time of day ("14:30", "14:30:15", "2:30 pm")
 *
 * @returns hours and minutes, or null when unparseable
 */
export function parseTimeOfDay(value: string): { hours: number; minutes: number } | null {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(?:([ap])\.?m\.?)?$/i.exec(value.trim());
  if (!match) {
    return null;
  }

  let hours = Number(match[1]);
  const minutes = Number(match[2]);
  const meridiem = match[4]?.toLowerCase();

  if (minutes > 59) {
    return null;
  }
  if (meridiem) {
    if (hours < 1 || hours > 12) {
      return null;
    }
    hours = (hours % 12) + (meridiem === 'p' ? 12 : 0);
  } else if (hours > 23) {
    return null;
  }

  return { hours, minutes };
}

export class Post {
  /** `_posts` folder location relative to the site source */
  readonly dir: string;
  /** File name relative to `_posts` */
  readonly name: string;
  readonly slug: string;
  readonly extension: string;
  readonly topics: readonly string[];
  readonly categories: readonly string[];
  readonly tags: readonly string[];
  readonly published: boolean;
  readonly metadata: Metadata;
  readonly frontMatter: FrontMatter;
  readonly content: string;
  readonly contentType: ContentType;
  readonly date: Date;

  private readonly base: string;
  private readonly permalinkStyle: PermalinkStyle;
  private readonly multiviews: boolean;
  private cachedGeneratedPath?: string;
  private rendered?: string;

  /**
   * @throws PostConstructionError when the filename or the `time` key cannot be parsed
   */
  constructor(source: PostSource, options: PostOptions = {}) {
    this.dir = source.dir;
    this.name = source.name;
    this.base = source.base;
    this.content = source.content;
    this.permalinkStyle = options.permalinkStyle ?? 'date';
    this.multiviews = options.multiviews ?? false;

    const parsed = parsePostFilename(source.name);
    if (parsed.kind === 'invalid') {
      throw new PostConstructionError(`Invalid post filename: ${parsed.reason}`, source.name);
    }

    this.slug = parsed.slug;
    this.extension = parsed.extension;
    this.topics = parsed.topics;
    this.contentType = contentTypeFor(parsed.extension);

    const metadata: Metadata = { ...options.defaults, ...source.metadata };
    if (metadata.title === undefined || metadata.title === null) {
      metadata.title = extractTitle(metadata, this.content, this.contentType, this.slug);
    }
    this.metadata = metadata;
    this.frontMatter = decodeFrontMatter(metadata);

    this.date = Post.applyTimeOfDay(parsed.date, this.frontMatter.time, source.name);
    this.published = this.frontMatter.published;
    this.categories = normalizeCategories(source.dir, this.frontMatter.categories);
    this.tags = normalizeTags(this.frontMatter.tags);
  }

  private static applyTimeOfDay(date: Date, time: string | undefined, name: string): Date {
    if (time === undefined) {
      return date;
    }

    const parsed = parseTimeOfDay(time);
    if (!parsed) {
      throw new PostConstructionError(`Invalid time "${time}" in front matter`, name);
    }

    return new Date(
      date.getFullYear(),
      date.getMonth(),
      date.getDate(),
      parsed.hours,
      parsed.minutes
    );
  }

  get title(): string {
    return this.frontMatter.title ?? '';
  }

  /** Explicit permalink from front matter */
  get permalink(): string | undefined {
    return this.frontMatter.permalink;
  }

  /** Permalink template of the active style */
  get template(): string {
    return permalinkTemplate(this.permalinkStyle);
  }

  /**
   * Output path relative to the destination, e.g. /2008/11/05/my-post.html
   */
  get generatedPath(): string {
    if (this.cachedGeneratedPath === undefined) {
      this.cachedGeneratedPath = resolvePermalink(this, this.permalinkStyle, this.permalink);
    }
    return this.cachedGeneratedPath;
  }

  get url(): string {
    return permalinkUrl(this.generatedPath, this.multiviews);
  }

  /** Directory part of the generated path */
  get outputDir(): string {
    return path.posix.dirname(this.generatedPath);
  }

  /**
   * Stable identity, e.g. /2008/11/05/my-post. Used for equality.
   */
  get identifier(): string {
    return path.posix.join(this.outputDir, this.slug);
  }

  /** Absolute path of the source file */
  get path(): string {
    return path.resolve(this.base, this.name);
  }

  get output(): string | undefined {
    return this.rendered;
  }

  /**
   * Records the rendered output. A post renders exactly once.
   */
  setOutput(output: string): void {
    if (this.rendered !== undefined) {
      throw new RenderError(`Post ${this.identifier} has already been rendered`, this.identifier);
    }
    this.rendered = output;
  }

  /**
   * Absolute output file under the destination root
   */
  destination(root: string): string {
    return outputFilePath(root, this.generatedPath, this.template);
  }

  toString(): string {
    return `<Post: ${this.identifier}>`;
  }
}
