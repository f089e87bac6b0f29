/**
 * Pinecone index holding post vectors
 */

import { Pinecone, Index } from '@pinecone-database/pinecone';
import { getConfig } from '../../types/config';
import * as logger from '../utils/logger';

let index: Index | null = null;

/**
 * The index named by PINECONE_INDEX at PINECONE_HOST, opened on first use
 */
export function getPineconeIndex(): Index {
  if (index) {
    return index;
  }

  const name = getConfig('PINECONE_INDEX');
  const host = getConfig('PINECONE_HOST');
  const pinecone = new Pinecone({ apiKey: getConfig('PINECONE_API_KEY') });

  index = pinecone.index(name, host);
  logger.info('Pinecone index opened', { index: name, host });

  return index;
}
