import { Controller, Get, Inject } from '@nestjs/common';
import {
  RETRIEVAL_SETTINGS,
  type RetrievalSettings,
} from '../config/retrieval.config';
import { QdrantConnection } from '../retrieval/store/qdrant-connection';

export interface HealthResponse {
  status: 'ok' | 'degraded';
  vectorStore: 'up' | 'down' | 'memory';
}

@Controller('health')
export class HealthController {
  constructor(
    @Inject(RETRIEVAL_SETTINGS) private readonly settings: RetrievalSettings,
    private readonly connection: QdrantConnection,
  ) {}

  @Get()
  async check(): Promise<HealthResponse> {
    if (this.settings.storeBackend === 'memory') {
      return { status: 'ok', vectorStore: 'memory' };
    }
    const healthy = await this.connection.isHealthy();
    return { status: healthy ? 'ok' : 'degraded', vectorStore: healthy ? 'up' : 'down' };
  }
}
