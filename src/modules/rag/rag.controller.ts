// modules/rag/rag.controller.ts
import { Controller, Get, Post, Body, HttpCode, HttpStatus, Logger } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBody } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { RagService } from './rag.service';
import { ChatMessageDto } from './dto/chat.dto/chat.dto';

@ApiTags('rag')
@Controller({ path: 'rag', version: '1' }) // API versioning: /v1/rag/*
export class RagController {
  private readonly logger = new Logger(RagController.name);

  constructor(private readonly ragService: RagService) {}

  /**
   * POST /rag/chat - Answer a question from the loaded documents
   */
  @Post('chat')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Send a message to the retrieval-augmented chatbot' })
  @ApiBody({ type: ChatMessageDto })
  @ApiResponse({
    status: 200,
    description: 'Chat answer, possibly a fallback when the LLM service failed',
    schema: {
      type: 'object',
      properties: {
        response: { type: 'string', example: 'Blue.' },
        success: { type: 'boolean', example: true },
        contextUsed: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              fileName: { type: 'string', example: 'sky.txt' },
              similarityScore: { type: 'number', example: 0.42 },
              contentPreview: { type: 'string' },
            },
          },
        },
        errorMessage: { type: 'string' },
        metadata: { type: 'object' },
      },
    },
  })
  async chat(@Body() dto: ChatMessageDto) {
    return this.ragService.chat(dto);
  }

  /**
   * POST /rag/documents/load - Load the documents folder and rebuild the index
   */
  @Post('documents/load')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 3, ttl: 60000 } }) // 3 per minute
  @ApiOperation({ summary: 'Load documents and initialize retrieval' })
  @ApiResponse({ status: 200, description: 'Documents loaded' })
  @ApiResponse({ status: 400, description: 'Documents folder missing or not a directory' })
  async loadDocuments() {
    const result = await this.ragService.loadDocuments();
    this.logger.log(`📥 Loaded ${result.documentCount} documents via REST API`);
    return result;
  }

  /**
   * GET /rag/documents/stats - File type breakdown of the documents folder
   */
  @Get('documents/stats')
  @ApiOperation({ summary: 'Get documents folder statistics' })
  @ApiResponse({ status: 200, description: 'Folder statistics' })
  async getDocumentStats() {
    return this.ragService.getDocumentStats();
  }

  /**
   * GET /rag/stats - Retrieval index statistics
   */
  @Get('stats')
  @ApiOperation({ summary: 'Get retrieval statistics' })
  @ApiResponse({
    status: 200,
    description: 'Retrieval statistics',
    schema: {
      type: 'object',
      properties: {
        initialized: { type: 'boolean', example: true },
        documentCount: { type: 'number', example: 12 },
        embeddingDimension: { type: 'number', example: 384 },
        lastUpdated: { type: 'string', format: 'date-time', nullable: true },
      },
    },
  })
  getStats() {
    return this.ragService.getStats();
  }
}
