/**
 * Unit tests for embedding generation
 */

jest.mock('../../src/lib/utils/logger');

const mockCreate = jest.fn();

jest.mock('../../src/lib/openai/client', () => ({
  getOpenAIClient: () => ({ embeddings: { create: mockCreate } }),
  getEmbeddingModel: () => 'text-embedding-3-small',
}));

import OpenAI from 'openai';
import { generateEmbedding } from '../../src/lib/openai/embeddings';
import { EmbeddingError, RateLimitError } from '../../src/lib/utils/errors';

function rateLimited(): InstanceType<typeof OpenAI.RateLimitError> {
  return new OpenAI.RateLimitError(429, undefined, 'Rate limit reached', { 'retry-after': '0' });
}

describe('generateEmbedding', () => {
  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('should return the embedding of the first item', async () => {
    mockCreate.mockResolvedValue({ data: [{ embedding: [0.1, 0.2] }] });

    await expect(generateEmbedding('apple pie')).resolves.toEqual([0.1, 0.2]);
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: 'apple pie',
      encoding_format: 'float',
    });
  });

  it('should retry rate limits', async () => {
    mockCreate
      .mockRejectedValueOnce(rateLimited())
      .mockResolvedValueOnce({ data: [{ embedding: [1] }] });

    await expect(generateEmbedding('apple pie')).resolves.toEqual([1]);
    expect(mockCreate).toHaveBeenCalledTimes(2);
  });

  it('should give up after three retries', async () => {
    mockCreate.mockRejectedValue(rateLimited());

    await expect(generateEmbedding('apple pie')).rejects.toThrow(RateLimitError);
    expect(mockCreate).toHaveBeenCalledTimes(4);
  });

  it('should wrap other failures', async () => {
    mockCreate.mockRejectedValue(new Error('socket hang up'));

    await expect(generateEmbedding('apple pie')).rejects.toThrow(EmbeddingError);
    expect(mockCreate).toHaveBeenCalledTimes(1);
  });

  it('should reject empty responses', async () => {
    mockCreate.mockResolvedValue({ data: [] });

    await expect(generateEmbedding('apple pie')).rejects.toThrow('Failed to generate embedding');
  });
});
