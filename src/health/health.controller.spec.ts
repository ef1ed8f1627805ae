import { QdrantConnection } from '../retrieval/store/qdrant-connection';
import { testSettings } from '../retrieval/testing/test-settings';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  it('reports the in-memory store as healthy', async () => {
    const settings = testSettings({ storeBackend: 'memory' });
    const controller = new HealthController(settings, new QdrantConnection(settings));

    await expect(controller.check()).resolves.toEqual({ status: 'ok', vectorStore: 'memory' });
  });

  it('reports a missing Qdrant connection as degraded', async () => {
    const settings = testSettings({ storeBackend: 'qdrant' });
    const controller = new HealthController(settings, new QdrantConnection(settings));

    await expect(controller.check()).resolves.toEqual({ status: 'degraded', vectorStore: 'down' });
  });
});
