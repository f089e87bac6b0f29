/**
 * Contract of a content-similarity engine used for related posts
 */

/**
 * What an engine needs from an item: a stable identity and its text
 */
export interface Indexable {
  readonly identifier: string;
  readonly content: string;
}

export interface SimilarityEngine<T extends Indexable> {
  /** Indexes one item by its content */
  add(item: T): Promise<void>;
  /** Up to `k` indexed items closest to `content`, closest first */
  query(content: string, k: number): Promise<T[]>;
  /** Resolves once every added item is visible to queries */
  ready?(): Promise<void>;
  /** Releases what the engine keeps outside the process */
  close?(): Promise<void>;
}

/**
 * Turns an item's text into a vector
 */
export type Embedder = (text: string) => Promise<number[]>;
