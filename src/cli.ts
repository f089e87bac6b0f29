#!/usr/bin/env node
/**
 * post-engine [source] [destination]
 *
 * Builds every post of the site at `source` (default: SITE_SOURCE or the
 * current directory) into `destination`. Exits with 1 when any post failed.
 */

import * as path from 'path';
import { getConfig, validateConfig } from './types/config';
import { buildSite } from './lib/site/build';
import { loadSiteConfig } from './lib/site/config';
import { cleanup } from './lib/text/tokens';
import { toError } from './lib/utils/errors';
import { initializeSentry, flushSentry, setTag, withSpan } from './lib/utils/sentry';
import { initializeTelemetry, flushTelemetry, trackOperation } from './lib/utils/telemetry';
import * as logger from './lib/utils/logger';

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  // Monitoring first so configuration errors are reported too
  initializeSentry();
  initializeTelemetry();

  const [source = getConfig('SITE_SOURCE', '.'), destination] = argv;

  try {
    const config = await loadSiteConfig(
      source,
      destination ? { destination: path.resolve(destination) } : {}
    );
    validateConfig(config.relatedPosts);
    setTag('related_posts', config.relatedPosts);

    const result = await withSpan('site.build', 'build', () =>
      trackOperation('site.build', () => buildSite(config), {
        relatedPosts: config.relatedPosts,
      })
    );

    for (const failure of result.failures) {
      console.error(`  ${failure.file}: ${failure.error.message}`);
    }
    console.info(
      `Built ${result.written.length} of ${result.posts.length} posts into ${config.destination}` +
        (result.failures.length > 0 ? ` (${result.failures.length} failed)` : '')
    );

    return result.failures.length > 0 ? 1 : 0;
  } catch (err) {
    logger.logError('Site build failed', toError(err));
    return 1;
  } finally {
    await flushSentry();
    await flushTelemetry();
    cleanup();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
