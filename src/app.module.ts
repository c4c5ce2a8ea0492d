import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RagModule } from './modules/rag/rag.module';
import { VectordbModule } from './modules/vectordb/vectordb.module';
import { LlmModule } from './modules/llm/llm.module';
import { EmbeddingModule } from './modules/embedding/embedding.module';
import ragConfig from './config/rag.config';
import { validate } from './config/env.validation';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';

@Module({
  imports: [
    ThrottlerModule.forRoot([
      {
        ttl: 60000, // 60 seconds
        limit: 10, // 10 requests per 60 seconds
      },
    ]),
    ConfigModule.forRoot({
      isGlobal: true,
      load: [ragConfig],
      validate,
    }),
    EmbeddingModule,
    VectordbModule,
    LlmModule,
    RagModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
