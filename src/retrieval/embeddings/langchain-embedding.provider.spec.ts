import { FakeEmbeddings } from '@langchain/core/utils/testing';
import { EmbeddingError } from '../errors/retrieval-errors';
import type { EmbeddingModels } from './embedding-provider.factory';
import {
  LangChainEmbeddingProvider,
  MAX_MULTIVECTOR_TOKENS,
  multivectorTokens,
  truncateAndNormalize,
} from './langchain-embedding.provider';
import { SparseEmbeddingService } from './sparse-embedding.service';

class OfflineEmbeddings extends FakeEmbeddings {
  async embedQuery(_document: string): Promise<number[]> {
    throw new Error('model offline');
  }
}

function models(dense = new FakeEmbeddings()): EmbeddingModels {
  const truncated = new FakeEmbeddings();
  return { dense, colbert: new FakeEmbeddings(), truncated: () => truncated };
}

describe('truncateAndNormalize', () => {
  it('keeps the leading components at unit length', () => {
    const [x, y] = truncateAndNormalize([3, 4, 12], 2);
    expect(x).toBeCloseTo(0.6, 12);
    expect(y).toBeCloseTo(0.8, 12);
  });

  it('leaves a zero head unscaled', () => {
    expect(truncateAndNormalize([0, 0, 1], 2)).toEqual([0, 0]);
  });

  it('rejects vectors shorter than requested', () => {
    expect(() => truncateAndNormalize([1], 2)).toThrow(EmbeddingError);
  });
});

describe('multivectorTokens', () => {
  it('splits on whitespace', () => {
    expect(multivectorTokens('  drain  the tank ')).toEqual(['drain', 'the', 'tank']);
  });

  it('caps the token count', () => {
    const text = Array.from({ length: MAX_MULTIVECTOR_TOKENS + 5 }, (_, i) => `t${i}`).join(' ');
    expect(multivectorTokens(text)).toHaveLength(MAX_MULTIVECTOR_TOKENS);
  });
});

describe('LangChainEmbeddingProvider', () => {
  const sparse = new SparseEmbeddingService();

  it('embeds one vector per query token', async () => {
    const provider = new LangChainEmbeddingProvider(models(), sparse);
    const vectors = await provider.embedMultivector('open the valve');

    expect(vectors).toEqual([
      [0.1, 0.2, 0.3, 0.4],
      [0.1, 0.2, 0.3, 0.4],
      [0.1, 0.2, 0.3, 0.4],
    ]);
  });

  it('rejects a multivector query without tokens', async () => {
    const provider = new LangChainEmbeddingProvider(models(), sparse);
    await expect(provider.embedMultivector('   ')).rejects.toThrow(
      'no tokens to embed for multivector query',
    );
  });

  it('truncates and renormalizes model output', async () => {
    const provider = new LangChainEmbeddingProvider(models(), sparse);
    const [x, y] = await provider.embedTruncated('boom angle', 2);

    expect(x).toBeCloseTo(0.1 / Math.sqrt(0.05), 10);
    expect(y).toBeCloseTo(0.2 / Math.sqrt(0.05), 10);
  });

  it('rejects a truncation wider than the model output', async () => {
    const provider = new LangChainEmbeddingProvider(models(), sparse);
    await expect(provider.embedTruncated('boom angle', 8)).rejects.toThrow(EmbeddingError);
  });

  it('wraps model failures in EmbeddingError', async () => {
    const provider = new LangChainEmbeddingProvider(models(new OfflineEmbeddings()), sparse);
    await expect(provider.embedDense('boom angle')).rejects.toThrow(
      'Embedding failed: dense: model offline',
    );
  });

  it('delegates sparse vectors to term hashing', async () => {
    const provider = new LangChainEmbeddingProvider(models(), sparse);
    expect(await provider.embedSparse('boom chain')).toEqual(
      sparse.generateSparseEmbedding('boom chain'),
    );
  });
});
