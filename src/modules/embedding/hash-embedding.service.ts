// modules/embedding/hash-embedding.service.ts
import { createHash } from 'crypto';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Embedder, EmbeddingVector } from './interfaces/embedder.interface';

const DEFAULT_DIMENSION = 384;

/**
 * Deterministic placeholder embedder.
 *
 * The MD5 digest of the text yields 16 bytes, each scaled to [-1, 1]; that
 * sequence is repeated to fill the configured dimension (or truncated when the
 * dimension is smaller). No network or disk access, and empty text still
 * produces a full vector.
 */
@Injectable()
export class HashEmbeddingService implements Embedder {
  private readonly logger = new Logger(HashEmbeddingService.name);
  readonly dimension: number;

  constructor(private configService: ConfigService) {
    this.dimension = this.configService.get<number>('embedding.dimension') || DEFAULT_DIMENSION;
    this.logger.log(`✅ Hash embedder initialized (dimension ${this.dimension})`);
  }

  async embed(text: string): Promise<EmbeddingVector> {
    return this.embedSync(text);
  }

  async embedMany(texts: string[]): Promise<EmbeddingVector[]> {
    return texts.map((text) => this.embedSync(text));
  }

  private embedSync(text: string): EmbeddingVector {
    const digest = createHash('md5').update(text, 'utf8').digest();
    const base = Array.from(digest, (byte) => (byte / 255) * 2 - 1);

    const vector: EmbeddingVector = new Array(this.dimension);
    for (let i = 0; i < this.dimension; i++) {
      vector[i] = base[i % base.length];
    }
    return vector;
  }
}
