/**
 * A value in decoded front matter (YAML scalars, sequences and mappings)
 */
export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | Date
  | MetadataValue[]
  | { [key: string]: MetadataValue };

/**
 * Open front matter mapping attached to a post or layout
 */
export type Metadata = { [key: string]: MetadataValue };

/**
 * Where a post's categories come from when its directory gives none.
 * Decoded once from `category` / `categories`.
 */
export type CategorySource =
  | { kind: 'none' }
  | { kind: 'single'; value: string }
  | { kind: 'list'; values: string[] };

/**
 * Recognized front matter keys, decoded from the raw metadata mapping
 */
export interface FrontMatter {
  title?: string;
  permalink?: string;
  categories: CategorySource;
  tags: string[];
  /** Time of day overriding the filename's, e.g. "14:30" */
  time?: string;
  published: boolean;
  layout?: string;
}

/**
 * Content types that drive title extraction and conversion
 */
export type ContentType = 'markdown' | 'textile' | 'unknown';

/**
 * Raw inputs for constructing a post
 */
export interface PostSource {
  /** Directory of the `_posts` folder relative to the site source, e.g. "code/ruby" */
  dir: string;
  /** File name relative to `_posts`, may contain sub-directories */
  name: string;
  /** Absolute path of the `_posts` folder */
  base: string;
  /** Decoded front matter */
  metadata: Metadata;
  /** Body after the front matter */
  content: string;
}
