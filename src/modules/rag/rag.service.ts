// modules/rag/rag.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ModelGatewayService } from '../llm/model-gateway.service';
import { GatewayError } from '../llm/interfaces/gateway.interface';
import { hasUsableContext } from '../llm/prompt.builder';
import { RetrievalService } from './services/retrieval.service';
import { DocumentLoaderService, LoadOptions } from './services/document-loader.service';
import { ChatMessageDto } from './dto/chat.dto/chat.dto';
import { ChatResponse, ContextSnippet, FolderStats, RetrievalStats } from './interfaces/chat.interface';
import { SimilarityMatch } from '../vectordb/interfaces/vector/vector.interface';
import { NO_CONTEXT_SENTINEL } from '../../common/constants/context.constants';
import { describeError } from '../../common/utils/error.util';

export const GENERIC_ERROR_RESPONSE =
  'I apologize, but an error occurred while processing your message.';

const FALLBACK_CONTEXT_LIMIT = 1000;

export interface LoadDocumentsResult {
  documentCount: number;
  documents: Array<{ fileName: string; relativePath: string; fileSize: number }>;
  folderPath: string;
  ragInitialized: boolean;
  message: string;
}

export function buildFallbackAnswer(context: string, message: string): string {
  if (hasUsableContext(context)) {
    const excerpt =
      context.length > FALLBACK_CONTEXT_LIMIT
        ? `${context.slice(0, FALLBACK_CONTEXT_LIMIT)}...`
        : context;
    return `I found some relevant information in the documents, but I'm currently unable to process it through the AI service.

Here's what I found related to your question "${message}":

${excerpt}

Please try again later or contact support if the issue persists.`;
  }
  return `I apologize, but I'm currently unable to process your question "${message}" due to a service issue. Please try again later or contact support if the issue persists.`;
}

function describeGatewayError(error: GatewayError | undefined): string {
  if (!error) return 'Unknown LLM error';
  return error.status ? `LLM API Error (${error.status}): ${error.message}` : error.message;
}

@Injectable()
export class RagService {
  private readonly logger = new Logger(RagService.name);

  private readonly documentsPath: string;
  private readonly loadOptions: LoadOptions;
  private readonly previewLength: number;

  constructor(
    private configService: ConfigService,
    private retrievalService: RetrievalService,
    private documentLoader: DocumentLoaderService,
    private modelGateway: ModelGatewayService,
  ) {
    this.documentsPath = this.configService.get<string>('rag.documentsPath') || './documents';
    this.loadOptions = {
      recurse: this.configService.get<boolean>('rag.recurseFolders') || false,
      supportedFileTypes: this.configService.get<string[]>('rag.supportedFileTypes') || ['.txt', '.md', '.pdf'],
    };
    this.previewLength = this.configService.get<number>('rag.contextPreviewLength') || 200;
  }

  /**
   * Answer a question from the loaded corpus.
   * Never throws: gateway failures produce a fallback answer, anything else a generic apology.
   */
  async chat(dto: ChatMessageDto): Promise<ChatResponse> {
    try {
      this.logger.log(`💬 Processing chat message: ${dto.message.slice(0, 100)}`);

      const matches = await this.retrievalService.retrieve(dto.message, dto.topKDocuments);
      const context = matches.length > 0 ? this.retrievalService.formatContext(matches) : NO_CONTEXT_SENTINEL;

      const result = await this.modelGateway.generate({
        message: dto.message,
        context,
        model: dto.model,
        maxTokens: dto.maxTokens,
        temperature: dto.temperature,
      });

      const contextUsed = matches.map((match) => this.toSnippet(match));
      const metadata = {
        documentsRetrieved: matches.length,
        queryLength: dto.message.length,
        timestamp: new Date().toISOString(),
        modelRequested: dto.model ?? null,
        modelUsed: result.modelUsed || null,
      };

      if (!result.success) {
        const errorMessage = describeGatewayError(result.error);
        this.logger.error(`❌ LLM request failed: ${errorMessage}`);

        return {
          response: buildFallbackAnswer(context, dto.message),
          success: false,
          contextUsed,
          errorMessage,
          metadata: { ...metadata, fallbackUsed: true },
        };
      }

      return { response: result.response, success: true, contextUsed, metadata };
    } catch (error) {
      this.logger.error(`Error in chat: ${describeError(error)}`);
      return {
        response: GENERIC_ERROR_RESPONSE,
        success: false,
        contextUsed: [],
        errorMessage: describeError(error),
      };
    }
  }

  /**
   * Load the configured folder and rebuild the index from it.
   */
  async loadDocuments(): Promise<LoadDocumentsResult> {
    const records = await this.documentLoader.loadFromFolder(this.documentsPath, this.loadOptions);
    const ragInitialized = await this.retrievalService.initialize(records);

    return {
      documentCount: records.length,
      documents: records.map((record) => ({
        fileName: record.fileName,
        relativePath: record.relativePath,
        fileSize: record.fileSize,
      })),
      folderPath: this.documentsPath,
      ragInitialized,
      message: ragInitialized
        ? 'Documents loaded and retrieval initialized successfully'
        : 'Documents loaded but no document could be indexed',
    };
  }

  getDocumentStats(): Promise<FolderStats> {
    return this.documentLoader.folderStats(this.documentsPath, this.loadOptions);
  }

  getStats(): RetrievalStats {
    return this.retrievalService.getStats();
  }

  private toSnippet({ document, score }: SimilarityMatch): ContextSnippet {
    const text = document.embeddedText;
    return {
      fileName: document.record.fileName,
      similarityScore: score,
      contentPreview: text.length > this.previewLength ? `${text.slice(0, this.previewLength)}...` : text,
    };
  }
}
