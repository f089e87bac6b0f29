/**
 * Reads posts and layouts from the site source
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import matter from 'gray-matter';
import { Layout } from '../../types/payload';
import { isValidPostFilename } from '../post/filename';
import { toMetadata } from '../post/frontMatter';
import { Post, PostOptions } from '../post/post';
import { PostConstructionError, isNodeError, isPostConstructionError, toError } from '../utils/errors';
import * as logger from '../utils/logger';

export const POSTS_DIR = '_posts';
export const LAYOUTS_DIR = '_layouts';

/**
 * A file that could not be turned into a written post
 */
export interface BuildFailure {
  /** Source file relative to the site source */
  file: string;
  error: Error;
}

/**
 * Entries skipped when walking the source: hidden, underscored, editor
 * backups and emacs lock files
 */
function isIgnoredEntry(name: string): boolean {
  return name.startsWith('.') || name.startsWith('_') || name.startsWith('#') || name.endsWith('~');
}

async function subdirectories(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
}

/**
 * Directories (relative to `source`, "" for the root) that contain a
 * `_posts` folder. The destination is never searched.
 */
export async function findPostDirectories(source: string, destination: string): Promise<string[]> {
  const found: string[] = [];
  const excluded = path.resolve(destination);

  async function walk(relative: string): Promise<void> {
    const absolute = path.join(source, relative);
    const names = await subdirectories(absolute);

    if (names.includes(POSTS_DIR)) {
      found.push(relative);
    }

    for (const name of names.sort()) {
      const child = path.join(absolute, name);
      if (isIgnoredEntry(name) || path.resolve(child) === excluded) {
        continue;
      }
      await walk(relative ? path.posix.join(relative, name) : name);
    }
  }

  await walk('');
  return found;
}

/**
 * Files under a `_posts` folder, relative to it and '/'-separated,
 * that pass the filename check
 */
export async function listPostFiles(postsDir: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(relative: string): Promise<void> {
    const entries = await fs.readdir(path.join(postsDir, relative), { withFileTypes: true });
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      if (isIgnoredEntry(entry.name)) {
        continue;
      }
      const name = relative ? `${relative}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(name);
      } else if (entry.isFile()) {
        files.push(name);
      }
    }
  }

  await walk('');

  const valid = files.filter(isValidPostFilename);
  if (valid.length < files.length) {
    logger.debug('Ignoring files without a post filename', {
      dir: postsDir,
      ignored: files.filter((file) => !isValidPostFilename(file)),
    });
  }
  return valid;
}

/**
 * Reads one post file and constructs the post
 *
 * @throws PostConstructionError for unreadable files, bad front matter or bad dates
 */
export async function readPostFile(
  source: string,
  dir: string,
  name: string,
  options: PostOptions
): Promise<Post> {
  const base = path.join(source, dir, POSTS_DIR);

  let parsed: matter.GrayMatterFile<string>;
  try {
    const raw = await fs.readFile(path.join(base, name), 'utf8');
    parsed = matter(raw);
  } catch (err) {
    throw new PostConstructionError(`Cannot read post: ${toError(err).message}`, name, toError(err));
  }

  return new Post(
    {
      dir,
      name,
      base,
      metadata: toMetadata(parsed.data),
      content: parsed.content,
    },
    options
  );
}

export interface ReadPostsResult {
  /** Published posts in discovery order */
  posts: Post[];
  unpublished: number;
  failures: BuildFailure[];
}

/**
 * Reads every post of the site. Posts that fail to construct are reported,
 * not thrown; unpublished posts are left out.
 */
export async function readPosts(
  source: string,
  destination: string,
  options: PostOptions
): Promise<ReadPostsResult> {
  const result: ReadPostsResult = { posts: [], unpublished: 0, failures: [] };

  for (const dir of await findPostDirectories(source, destination)) {
    const postsDir = path.join(source, dir, POSTS_DIR);

    for (const name of await listPostFiles(postsDir)) {
      const file = path.posix.join(dir, POSTS_DIR, name);
      try {
        const post = await readPostFile(source, dir, name, options);
        if (post.published) {
          result.posts.push(post);
        } else {
          result.unpublished++;
        }
      } catch (err) {
        const error = toError(err);
        if (!isPostConstructionError(error)) {
          throw error;
        }
        logger.logError(`Failed to read post ${file}`, error, { file });
        result.failures.push({ file, error });
      }
    }
  }

  logger.info('Posts read', {
    published: result.posts.length,
    unpublished: result.unpublished,
    failed: result.failures.length,
  });

  return result;
}

/**
 * Reads `_layouts/*`; a layout's name is its file name without extension
 */
export async function readLayouts(source: string): Promise<Map<string, Layout>> {
  const dir = path.join(source, LAYOUTS_DIR);
  const layouts = new Map<string, Layout>();

  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if (isNodeError(err, 'ENOENT')) {
      return layouts;
    }
    throw err;
  }

  for (const entry of entries.sort()) {
    if (isIgnoredEntry(entry)) {
      continue;
    }
    const file = path.join(dir, entry);
    const stat = await fs.stat(file);
    if (!stat.isFile()) {
      continue;
    }

    const parsed = matter(await fs.readFile(file, 'utf8'));
    const name = path.basename(entry, path.extname(entry));
    layouts.set(name, { name, content: parsed.content, data: toMetadata(parsed.data) });
  }

  logger.debug('Layouts read', { layouts: [...layouts.keys()] });
  return layouts;
}
