import { EmbeddingVector } from '../../../embedding/interfaces/embedder.interface';

/**
 * A document as produced by the loader. Never mutated after loading.
 */
export interface DocumentRecord {
  readonly filePath: string;
  readonly fileName: string;
  readonly fileSize: number;
  readonly fileExtension: string;
  readonly lastModified: string;
  readonly relativePath: string;
  readonly sha256: string;
  readonly content: string;
}

export interface IndexedDocument {
  id: string;
  record: DocumentRecord;
  // Text that was actually embedded (file name when content is empty)
  embeddedText: string;
  embedding: EmbeddingVector;
}

export interface SimilarityMatch {
  document: IndexedDocument;
  score: number;
}
