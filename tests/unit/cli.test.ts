/**
 * Unit tests for the command line entry point
 */

jest.mock('../../src/lib/utils/logger');
jest.mock('../../src/lib/site/build');

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { main } from '../../src/cli';
import { buildSite } from '../../src/lib/site/build';
import { RenderError } from '../../src/lib/utils/errors';

const mockBuildSite = jest.mocked(buildSite);
const originalEnv = process.env;

describe('main', () => {
  let source: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.RELATED_POSTS;
    delete process.env.SITE_DESTINATION;
    delete process.env.OPENAI_API_KEY;
    source = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
    jest.spyOn(console, 'info').mockImplementation();
    jest.spyOn(console, 'error').mockImplementation();
    mockBuildSite.mockReset();
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
    fs.rmSync(source, { recursive: true, force: true });
  });

  it('should build the given source into the given destination', async () => {
    mockBuildSite.mockResolvedValue({ posts: [], written: [], unpublished: 0, failures: [], durationMs: 1 });

    await expect(main([source, 'out'])).resolves.toBe(0);

    expect(mockBuildSite).toHaveBeenCalledTimes(1);
    expect(mockBuildSite.mock.calls[0][0]).toMatchObject({
      source: path.resolve(source),
      destination: path.resolve('out'),
      relatedPosts: 'naive',
    });
  });

  it('should exit with 1 when a post failed', async () => {
    mockBuildSite.mockResolvedValue({
      posts: [],
      written: [],
      unpublished: 0,
      failures: [{ file: '_posts/2008-11-05-a.md', error: new RenderError('Failed to render') }],
      durationMs: 1,
    });

    await expect(main([source])).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith('  _posts/2008-11-05-a.md: Failed to render');
  });

  it('should exit with 1 when credentials are missing', async () => {
    process.env.RELATED_POSTS = 'embeddings';

    await expect(main([source])).resolves.toBe(1);
    expect(mockBuildSite).not.toHaveBeenCalled();
  });
});
