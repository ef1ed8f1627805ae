/**
 * Qdrant Connection
 * One client per process, created on startup and injected wherever a store is needed
 */

import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { QdrantClient } from '@qdrant/js-client-rest';
import {
  RETRIEVAL_SETTINGS,
  type RetrievalSettings,
} from '../../config/retrieval.config';
import { StoreError, errorMessage } from '../errors/retrieval-errors';

@Injectable()
export class QdrantConnection implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(QdrantConnection.name);
  private client: QdrantClient | null = null;

  constructor(
    @Inject(RETRIEVAL_SETTINGS) private readonly settings: RetrievalSettings,
  ) {}

  onModuleInit(): void {
    this.init();
  }

  onApplicationShutdown(): void {
    this.close();
  }

  init(): void {
    if (this.client) return;

    const { endpoint, credential, timeoutMs } = this.settings.store;
    this.client = new QdrantClient({
      url: endpoint,
      ...(credential && { apiKey: credential }),
      timeout: timeoutMs,
    });

    this.logger.log(`QdrantClient initialized: ${endpoint} (timeout=${timeoutMs}ms)`);
  }

  getClient(): QdrantClient {
    if (!this.client) {
      throw new StoreError('Qdrant connection is not initialized');
    }
    return this.client;
  }

  /**
   * Safe to call more than once
   */
  close(): void {
    if (!this.client) return;
    this.client = null;
    this.logger.log('Qdrant connection was closed');
  }

  async isHealthy(): Promise<boolean> {
    if (!this.client) return false;
    try {
      await this.client.getCollections();
      return true;
    } catch (error) {
      this.logger.warn(`Qdrant health check failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
