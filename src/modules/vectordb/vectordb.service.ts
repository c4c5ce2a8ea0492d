// modules/vectordb/vectordb.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IndexedDocument, SimilarityMatch } from './interfaces/vector/vector.interface';

const DEFAULT_DIMENSION = 384;

export class VectorDimensionError extends Error {
  constructor(expected: number, actual: number, context: string) {
    super(`Vector dimension mismatch for ${context}: expected ${expected}, got ${actual}`);
    this.name = 'VectorDimensionError';
  }
}

/**
 * Cosine similarity in [-1, 1]. Zero-norm vectors score 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  if (denom === 0) return 0;
  return Math.min(1, Math.max(-1, dot / denom));
}

/**
 * In-memory vector store. Search is a linear scan over every stored vector.
 */
@Injectable()
export class VectorDbService {
  private readonly logger = new Logger(VectorDbService.name);
  private documents: IndexedDocument[] = [];
  readonly dimension: number;

  constructor(private configService: ConfigService) {
    this.dimension = this.configService.get<number>('embedding.dimension') || DEFAULT_DIMENSION;
    this.logger.log(`✅ In-memory vector store initialized (dimension ${this.dimension})`);
  }

  /**
   * Append documents. The whole batch is rejected if any vector has the wrong dimension.
   */
  add(documents: IndexedDocument[]): void {
    for (const doc of documents) {
      if (doc.embedding.length !== this.dimension) {
        throw new VectorDimensionError(this.dimension, doc.embedding.length, doc.record.fileName);
      }
    }

    this.documents.push(...documents);
    this.logger.log(`📚 Added ${documents.length} documents. Total: ${this.documents.length}`);
  }

  search(queryEmbedding: number[], topK: number): SimilarityMatch[] {
    if (queryEmbedding.length !== this.dimension) {
      throw new VectorDimensionError(this.dimension, queryEmbedding.length, 'query');
    }

    if (this.documents.length === 0) {
      this.logger.warn('No documents in vector store for similarity search');
      return [];
    }

    if (topK <= 0) return [];

    // Array.prototype.sort is stable, so equal scores keep insertion order
    return this.documents
      .map((document) => ({ document, score: cosineSimilarity(queryEmbedding, document.embedding) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  clear(): void {
    this.documents = [];
    this.logger.log('🗑️  Vector store cleared');
  }

  size(): number {
    return this.documents.length;
  }

  /**
   * Dimension of the stored vectors, 0 when the store is empty.
   */
  getStoredDimension(): number {
    return this.documents.length > 0 ? this.documents[0].embedding.length : 0;
  }

  getDocuments(): readonly IndexedDocument[] {
    return this.documents;
  }
}
