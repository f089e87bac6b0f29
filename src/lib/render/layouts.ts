/**
 * Layout chain resolution
 */

import { Layout, LayoutMap } from '../../types/payload';
import { scalarToString } from '../post/frontMatter';
import { RenderError } from '../utils/errors';
import * as logger from '../utils/logger';

/**
 * Follows `layout` references from `name` outwards: the post's layout first,
 * then the layout it names, and so on. An unknown name ends the chain.
 *
 * @throws RenderError when a layout is reached twice
 */
export function resolveLayoutChain(layouts: LayoutMap, name: string | undefined): Layout[] {
  const chain: Layout[] = [];
  const seen = new Set<string>();
  let current = name;

  while (current !== undefined) {
    const layout = layouts.get(current);
    if (!layout) {
      logger.warn('Layout not found', { layout: current });
      break;
    }
    if (seen.has(current)) {
      throw new RenderError(`Layout cycle: ${[...seen, current].join(' -> ')}`);
    }

    seen.add(current);
    chain.push(layout);
    current = scalarToString(layout.data.layout);
  }

  return chain;
}
