export interface RetrievalStats {
  initialized: boolean;
  documentCount: number;
  embeddingDimension: number;
  lastUpdated: string | null;
}

export interface ContextSnippet {
  fileName: string;
  similarityScore: number;
  contentPreview: string;
}

export interface ChatMetadata {
  documentsRetrieved: number;
  queryLength: number;
  timestamp: string;
  modelRequested: string | null;
  modelUsed: string | null;
  fallbackUsed?: boolean;
}

/**
 * Caller-facing chat result. Failures still carry a best-effort answer.
 */
export interface ChatResponse {
  response: string;
  success: boolean;
  contextUsed: ContextSnippet[];
  errorMessage?: string;
  metadata?: ChatMetadata;
}

export interface FolderStats {
  folderPath: string;
  supportedTypes: string[];
  recurseEnabled: boolean;
  totalFiles: number;
  supportedFiles: number;
  fileTypeBreakdown: Record<string, number>;
}
