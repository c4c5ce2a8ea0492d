export type EmbeddingVector = number[];

export const EMBEDDER = Symbol('EMBEDDER');

/**
 * Text to fixed-dimension vector mapping. Implementations must always return
 * exactly `dimension` values so a real model can replace the placeholder
 * without touching the vector store or retrieval code.
 */
export interface Embedder {
  readonly dimension: number;
  embed(text: string): Promise<EmbeddingVector>;
}
