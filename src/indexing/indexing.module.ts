import { Module } from '@nestjs/common';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { CollectionInitializer } from './collection-init.service';
import { IndexingController } from './indexing.controller';
import { PageIndexer } from './page-indexer.service';

@Module({
  imports: [RetrievalModule],
  providers: [CollectionInitializer, PageIndexer],
  controllers: [IndexingController],
})
export class IndexingModule {}
