// modules/rag/services/retrieval.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { VectorDbService, VectorDimensionError } from '../../vectordb/vectordb.service';
import { EMBEDDER, Embedder } from '../../embedding/interfaces/embedder.interface';
import {
  DocumentRecord,
  IndexedDocument,
  SimilarityMatch,
} from '../../vectordb/interfaces/vector/vector.interface';
import { RetrievalStats } from '../interfaces/chat.interface';
import { NO_CONTEXT_SENTINEL } from '../../../common/constants/context.constants';
import { describeError } from '../../../common/utils/error.util';

const CONTEXT_CONTENT_LIMIT = 500;

@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);
  private initialized = false;
  private lastUpdated: Date | null = null;
  private readonly topK: number;

  constructor(
    private configService: ConfigService,
    private vectorDbService: VectorDbService,
    @Inject(EMBEDDER) private embedder: Embedder,
  ) {
    this.topK = this.configService.get<number>('rag.topK') || 3;
  }

  /**
   * Embed the corpus and replace the store contents with it.
   * Documents that fail to embed are skipped. Returns whether retrieval is now usable.
   */
  async initialize(records: DocumentRecord[]): Promise<boolean> {
    this.logger.log(`📚 Initializing retrieval with ${records.length} documents`);

    const indexed: IndexedDocument[] = [];
    for (const record of records) {
      try {
        indexed.push(await this.indexRecord(record));
      } catch (error) {
        this.logger.error(`Failed to embed ${record.fileName}: ${describeError(error)}`);
      }
    }

    try {
      this.vectorDbService.clear();
      this.vectorDbService.add(indexed);
    } catch (error) {
      this.initialized = false;
      this.logger.error(`❌ Failed to load the vector store: ${describeError(error)}`);
      return false;
    }

    this.initialized = indexed.length > 0;
    if (this.initialized) {
      this.lastUpdated = new Date();
      this.logger.log(`✅ Retrieval initialized with ${indexed.length}/${records.length} documents`);
    } else {
      this.logger.warn('No documents could be embedded, retrieval stays uninitialized');
    }
    return this.initialized;
  }

  async retrieve(query: string, topK: number = this.topK): Promise<SimilarityMatch[]> {
    if (!this.initialized) {
      this.logger.warn('Retrieval requested before initialization');
      return [];
    }

    const queryEmbedding = await this.embedder.embed(query);
    const matches = this.vectorDbService.search(queryEmbedding, topK);

    this.logger.log(`🔍 Retrieved ${matches.length} documents for query`);
    return matches;
  }

  /**
   * Render matches as one delimited block for the prompt.
   */
  formatContext(matches: SimilarityMatch[]): string {
    if (matches.length === 0) return NO_CONTEXT_SENTINEL;

    return matches
      .map(({ document, score }, idx) => {
        const text = document.embeddedText;
        const content =
          text.length > CONTEXT_CONTENT_LIMIT ? `${text.slice(0, CONTEXT_CONTENT_LIMIT)}...` : text;
        return (
          `Document ${idx + 1} (similarity: ${score.toFixed(3)}):\n` +
          `Source: ${document.record.fileName}\n` +
          `Content: ${content}\n`
        );
      })
      .join('\n---\n');
  }

  getStats(): RetrievalStats {
    return {
      initialized: this.initialized,
      documentCount: this.vectorDbService.size(),
      embeddingDimension: this.vectorDbService.getStoredDimension(),
      lastUpdated: this.lastUpdated ? this.lastUpdated.toISOString() : null,
    };
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  private async indexRecord(record: DocumentRecord): Promise<IndexedDocument> {
    const embeddedText = record.content || record.fileName;
    const embedding = await this.embedder.embed(embeddedText);

    if (embedding.length !== this.vectorDbService.dimension) {
      throw new VectorDimensionError(this.vectorDbService.dimension, embedding.length, record.fileName);
    }

    return { id: uuidv4(), record, embeddedText, embedding };
  }
}
