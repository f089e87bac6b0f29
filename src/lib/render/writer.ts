/**
 * Writes rendered posts to the destination directory
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Post } from '../post/post';
import { WriteError, toError } from '../utils/errors';
import * as logger from '../utils/logger';

/**
 * Writes a rendered post under `destination`. Templates without ".html"
 * produce `<path>/index.html`, others the path itself.
 *
 * @returns The file written
 * @throws WriteError when the post has not been rendered or the write fails
 */
export async function writePost(post: Post, destination: string): Promise<string> {
  const target = post.destination(destination);
  const output = post.output;

  if (output === undefined) {
    throw new WriteError(`Post ${post.identifier} has not been rendered`, target);
  }

  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, output, 'utf8');
  } catch (err) {
    throw new WriteError(`Failed to write ${target}`, target, toError(err));
  }

  logger.debug('Post written', { identifier: post.identifier, path: target });
  return target;
}
