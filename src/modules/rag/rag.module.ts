import { Module } from '@nestjs/common';
import { RagController } from './rag.controller';
import { RagService } from './rag.service';
import { EmbeddingModule } from '../embedding/embedding.module';
import { VectordbModule } from '../vectordb/vectordb.module';
import { LlmModule } from '../llm/llm.module';
import { RetrievalService, DocumentLoaderService } from './services';

@Module({
  imports: [EmbeddingModule, VectordbModule, LlmModule],
  controllers: [RagController],
  providers: [RagService, RetrievalService, DocumentLoaderService],
  exports: [RagService, RetrievalService],
})
export class RagModule {}
