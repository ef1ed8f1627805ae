import { Module } from '@nestjs/common';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { HealthController } from './health.controller';

@Module({
  imports: [RetrievalModule],
  controllers: [HealthController],
})
export class HealthModule {}
