import { Module } from '@nestjs/common';
import { HashEmbeddingService } from './hash-embedding.service';
import { EMBEDDER } from './interfaces/embedder.interface';

@Module({
  providers: [HashEmbeddingService, { provide: EMBEDDER, useExisting: HashEmbeddingService }],
  exports: [EMBEDDER, HashEmbeddingService],
})
export class EmbeddingModule {}
