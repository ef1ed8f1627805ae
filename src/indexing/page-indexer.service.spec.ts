import { InMemoryVectorStore } from '../retrieval/store/in-memory-vector-store';
import { pointIdFromKey } from '../retrieval/store/point-id';
import { vectorStage } from '../retrieval/store/staged-query';
import { FakeEmbeddingProvider } from '../retrieval/testing/fake-embedding.provider';
import { testSettings } from '../retrieval/testing/test-settings';
import { CollectionInitializer, buildCollectionSchema } from './collection-init.service';
import { PageIndexer } from './page-indexer.service';

function page(pageNumber: number) {
  return {
    document_metadata: { document_id: 'doc-1', document_title: 'Service Manual' },
    page_number: pageNumber,
    text_content: `Page ${pageNumber} text`,
  };
}

describe('PageIndexer', () => {
  let store: InMemoryVectorStore;
  let embeddings: FakeEmbeddingProvider;
  let indexer: PageIndexer;

  beforeEach(() => {
    store = new InMemoryVectorStore();
    embeddings = new FakeEmbeddingProvider();
    indexer = new PageIndexer(
      testSettings({ collectionName: 'default-collection' }),
      store,
      embeddings,
      new CollectionInitializer(store, embeddings),
    );
  });

  it('creates the collection and upserts every page', async () => {
    const result = await indexer.indexPages([page(12), page(13)], {
      collection: 'manual',
      batchSize: 1,
    });

    expect(result).toEqual({ indexed: 2, collection: 'manual' });
    const points = await store.query('manual', {
      plan: vectorStage({ field: 'dense', vector: [1, 0, 0] }, 10),
      withPayload: true,
    });
    expect(points.map((point) => point.id).sort()).toEqual(
      [pointIdFromKey('doc-1_page_12'), pointIdFromKey('doc-1_page_13')].sort(),
    );
    expect(points[0].payload.document_id).toBe('doc-1');
  });

  it('reuses an existing collection', async () => {
    await indexer.indexPages([page(1)]);
    await expect(indexer.indexPages([page(2)])).resolves.toEqual({
      indexed: 1,
      collection: 'default-collection',
    });
  });

  it('embeds every vector kind from the page text', async () => {
    await indexer.indexPages([page(3)], { collection: 'manual' });

    const text = 'Document: Service Manual (, Revision )\n\nSection:  \n\nSubsection:  \n\nPage: 3\n\nFull Text Content:\nPage 3 text';
    expect(embeddings.calls).toEqual(
      expect.arrayContaining([
        `dense:${text}`,
        `sparse:${text}`,
        `multivector:${text}`,
        `truncated(128):${text}`,
        `truncated(1024):${text}`,
      ]),
    );
  });

  it('falls back to the position for pages without a number', () => {
    expect(indexer.pointIdForPage({}, 5)).toBe(pointIdFromKey('unknown_page_5'));
  });
});

describe('buildCollectionSchema', () => {
  it('declares the five vector fields', () => {
    expect(buildCollectionSchema(384, 128)).toEqual({
      vectors: {
        dense: { size: 384, distance: 'Cosine' },
        colbert: { size: 128, distance: 'Cosine', multivector: true },
        'small-embedding': { size: 128, distance: 'Cosine', datatype: 'float16' },
        'large-embedding': { size: 1024, distance: 'Cosine', datatype: 'float16' },
      },
      sparseVectors: ['sparse'],
    });
  });
});
