// modules/llm/llm.controller.ts
import { Controller, Get, HttpCode, HttpStatus, Logger, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ModelGatewayService } from './model-gateway.service';
import { AuthSessionService } from './auth-session.service';

@ApiTags('llm')
@Controller({ path: 'llm', version: '1' })
export class LlmController {
  private readonly logger = new Logger(LlmController.name);

  constructor(
    private readonly modelGateway: ModelGatewayService,
    private readonly authSession: AuthSessionService,
  ) {}

  /**
   * GET /llm/health - Check connectivity to the LLM service
   */
  @Get('health')
  @ApiOperation({ summary: 'Check connection to the LLM service' })
  @ApiResponse({
    status: 200,
    description: 'Connectivity report',
    schema: {
      type: 'object',
      properties: {
        status: { type: 'string', example: 'ok' },
        message: { type: 'string', example: 'Connected to the LLM service' },
        gatewayReachable: { type: 'boolean' },
        tokenValid: { type: 'boolean' },
      },
    },
  })
  async health() {
    const gatewayReachable = await this.modelGateway.healthCheck();
    const tokenValid = await this.authSession.checkValidity();
    const ok = gatewayReachable && tokenValid;

    return {
      status: ok ? 'ok' : 'error',
      message: ok ? 'Connected to the LLM service' : 'Failed to connect to the LLM service',
      gatewayReachable,
      tokenValid,
    };
  }

  /**
   * GET /llm/models - List available chat models
   */
  @Get('models')
  @ApiOperation({ summary: 'Get available LLM models' })
  @ApiResponse({
    status: 200,
    description: 'Available models',
    schema: {
      type: 'object',
      properties: {
        availableModels: { type: 'array', items: { type: 'string' }, example: ['gpt-4o'] },
        defaultModel: { type: 'string', example: 'gpt-4o' },
        totalModels: { type: 'number', example: 1 },
        source: { type: 'string', example: 'remote' },
        message: { type: 'string' },
      },
    },
  })
  async getModels() {
    const models = await this.modelGateway.listModels();
    const availableModels = await this.modelGateway.getAvailableModels();
    const defaultModel = await this.modelGateway.getDefaultModel();
    const source = this.modelGateway.getModelsSource();

    return {
      availableModels,
      defaultModel,
      totalModels: availableModels.length,
      modelsDetails: models.map((model) => model.raw),
      source,
      success: true,
      message:
        source === 'remote'
          ? 'Models retrieved successfully'
          : 'Using fallback models (API may not be accessible)',
    };
  }

  /**
   * POST /llm/models/refresh - Drop the model cache and fetch again
   */
  @Post('models/refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Refresh available models cache' })
  @ApiResponse({ status: 200, description: 'Models cache refreshed' })
  async refreshModels() {
    const models = await this.modelGateway.refreshModels();
    const availableModels = await this.modelGateway.getAvailableModels();

    this.logger.log(`🔄 Models cache refreshed via REST API (${models.length} models)`);

    return {
      message: 'Models cache refreshed successfully',
      availableModels,
      totalModels: availableModels.length,
      modelsFetched: models.length,
      source: this.modelGateway.getModelsSource(),
      success: true,
    };
  }
}
