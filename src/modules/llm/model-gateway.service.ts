// modules/llm/model-gateway.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuthSessionService } from './auth-session.service';
import { HttpClientService, HttpResponse } from './http-client.service';
import { AGENT_HEADER, HEALTHY_PROBE_STATUSES, LlmEndpoints } from './llm.endpoints';
import {
  AccessToken,
  GatewayError,
  GatewayResult,
  GenerateRequest,
  ModelDescriptor,
  ModelSource,
} from './interfaces/gateway.interface';
import {
  DEFAULT_MODEL,
  chatModelNames,
  fallbackModels,
  parseModelListing,
  pickDefaultModel,
  selectModelName,
} from './model-discovery';
import { extractErrorMessage, normalizeResponse } from './response-normalizer';
import { SYSTEM_PROMPT, buildPrompt } from './prompt.builder';
import { describeError } from '../../common/utils/error.util';
import { tryParseJson } from '../../common/utils/json.util';

export const ALL_ENDPOINTS_FAILED_MESSAGE =
  'All API endpoints failed. The LLM service may be unavailable or the model may not be supported.';

@Injectable()
export class ModelGatewayService {
  private readonly logger = new Logger(ModelGatewayService.name);
  private modelsCache: ModelDescriptor[] | null = null;
  private modelsSource: ModelSource | null = null;

  private readonly baseUrl: string;
  private readonly agentName: string;
  private readonly requestTimeoutMs: number;
  private readonly discoveryTimeoutMs: number;
  private readonly healthTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly defaultTemperature: number;

  constructor(
    private configService: ConfigService,
    private authSession: AuthSessionService,
    private httpClient: HttpClientService,
  ) {
    this.baseUrl = (this.configService.get<string>('llm.baseUrl') || '').replace(/\/+$/, '');
    this.agentName = this.configService.get<string>('llm.agentName') || 'llm-chatbot-rag';
    this.requestTimeoutMs = this.configService.get<number>('llm.requestTimeoutMs') || 30000;
    this.discoveryTimeoutMs = this.configService.get<number>('llm.authTimeoutMs') || 10000;
    this.healthTimeoutMs = this.configService.get<number>('llm.healthTimeoutMs') || 10000;
    this.defaultMaxTokens = this.configService.get<number>('rag.maxTokens') || 1000;
    this.defaultTemperature = this.configService.get<number>('rag.temperature') ?? 0.7;
  }

  /**
   * Discovered models, or the known fallback set when discovery fails. Cached until refreshModels().
   */
  async listModels(): Promise<ModelDescriptor[]> {
    if (this.modelsCache) return this.modelsCache;

    const { models, source } = await this.fetchModels();
    this.modelsCache = models;
    this.modelsSource = source;
    return models;
  }

  async refreshModels(): Promise<ModelDescriptor[]> {
    this.modelsCache = null;
    this.modelsSource = null;
    this.logger.log('🔄 Model cache invalidated');
    return this.listModels();
  }

  getModelsSource(): ModelSource | null {
    return this.modelsSource;
  }

  async getAvailableModels(): Promise<string[]> {
    return chatModelNames(await this.listModels());
  }

  async getDefaultModel(): Promise<string> {
    return pickDefaultModel(await this.getAvailableModels()).name;
  }

  async selectModel(requested?: string): Promise<string> {
    const available = await this.getAvailableModels();
    const selection = selectModelName(available, requested);

    if (requested && selection.rule !== 'exact' && selection.rule !== 'partial') {
      this.logger.warn(
        `Requested model '${requested}' not available (${available.join(', ')}), using ${selection.name}`,
      );
    } else {
      this.logger.log(`🤖 Selected model ${selection.name} (${selection.rule})`);
    }
    return selection.name;
  }

  /**
   * Send one chat request, walking the endpoint variants in order.
   * 404 and transport failures move on to the next variant; any other
   * non-200 status is final. Never throws.
   */
  async generate(request: GenerateRequest): Promise<GatewayResult> {
    const model = await this.selectModel(request.model);

    let token: AccessToken;
    try {
      token = await this.authSession.ensureToken();
    } catch (error) {
      this.logger.error(`❌ Cannot call the LLM service: ${describeError(error)}`);
      return this.failure(model, { kind: 'authentication', message: describeError(error) });
    }

    const body = {
      model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildPrompt(request.message, request.context) },
      ],
      max_tokens: request.maxTokens ?? this.defaultMaxTokens,
      temperature: request.temperature ?? this.defaultTemperature,
    };
    const headers = this.buildHeaders(token, request.agentName);

    for (const endpoint of LlmEndpoints.CHAT_COMPLETION_VARIANTS) {
      let response: HttpResponse;
      try {
        this.logger.log(`➡️  Trying ${endpoint} with model ${model}`);
        response = await this.httpClient.send({
          method: 'POST',
          url: `${this.baseUrl}${endpoint}`,
          headers,
          body,
          timeoutMs: this.requestTimeoutMs,
        });
      } catch (error) {
        this.logger.warn(`Request to ${endpoint} failed: ${describeError(error)}`);
        continue;
      }

      if (response.status === 200) {
        return this.parseSuccess(response, model, endpoint);
      }
      if (response.status === 404) {
        this.logger.debug(`404 for ${endpoint}, trying next endpoint`);
        continue;
      }
      return this.parseRejection(response, model, endpoint);
    }

    this.logger.error(`❌ ${ALL_ENDPOINTS_FAILED_MESSAGE}`);
    return this.failure(model, { kind: 'unavailable', message: ALL_ENDPOINTS_FAILED_MESSAGE });
  }

  /**
   * Reachability probe against the primary chat endpoint. A validation
   * rejection counts as healthy.
   */
  async healthCheck(): Promise<boolean> {
    try {
      const token = await this.authSession.ensureToken();
      const response = await this.httpClient.send({
        method: 'POST',
        url: `${this.baseUrl}${LlmEndpoints.CHAT_COMPLETION_VARIANTS[0]}`,
        headers: this.buildHeaders(token),
        body: {
          model: DEFAULT_MODEL,
          messages: [{ role: 'user', content: 'test' }],
          max_tokens: 1,
        },
        timeoutMs: this.healthTimeoutMs,
      });

      const healthy = HEALTHY_PROBE_STATUSES.includes(response.status);
      if (!healthy) this.logger.warn(`Health probe returned status ${response.status}`);
      return healthy;
    } catch (error) {
      this.logger.warn(`Health probe failed: ${describeError(error)}`);
      return false;
    }
  }

  private async fetchModels(): Promise<{ models: ModelDescriptor[]; source: ModelSource }> {
    const fallback = { models: fallbackModels(), source: 'fallback' as const };

    try {
      const token = await this.authSession.ensureToken();
      const response = await this.httpClient.send({
        method: 'GET',
        url: `${this.baseUrl}${LlmEndpoints.MODELS}`,
        headers: {
          Accept: 'application/json',
          Authorization: `Bearer ${token.accessToken}`,
          [AGENT_HEADER]: this.agentName,
        },
        timeoutMs: this.discoveryTimeoutMs,
      });

      if (response.status !== 200) {
        this.logger.warn(`Models API returned ${response.status}, using known models`);
        return fallback;
      }

      const models = parseModelListing(tryParseJson(response.text));
      if (!models) {
        this.logger.warn('Unexpected models payload, using known models');
        return fallback;
      }

      this.logger.log(`📋 Cached ${models.length} models from the models API`);
      return { models, source: 'remote' };
    } catch (error) {
      this.logger.warn(`Model discovery failed (${describeError(error)}), using known models`);
      return fallback;
    }
  }

  private buildHeaders(token: AccessToken, agentName?: string): Record<string, string> {
    return {
      Authorization: `Bearer ${token.accessToken}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
      [AGENT_HEADER]: agentName || this.agentName,
    };
  }

  private parseSuccess(response: HttpResponse, model: string, endpoint: string): GatewayResult {
    const normalized = normalizeResponse(tryParseJson(response.text));

    if (!normalized.ok) {
      this.logger.warn(`${normalized.reason} (${endpoint}): ${response.text.slice(0, 300)}`);
      return this.failure(model, { kind: 'schema', message: normalized.reason, endpoint });
    }

    this.logger.log(`✅ Response from ${endpoint} via ${normalized.rule}`);
    return { success: true, response: normalized.text, modelUsed: model, endpoint };
  }

  private parseRejection(response: HttpResponse, model: string, endpoint: string): GatewayResult {
    const details = tryParseJson(response.text);
    const message =
      extractErrorMessage(details) ?? `HTTP ${response.status}: ${response.text.slice(0, 500)}`;

    if (response.status === 401) {
      this.authSession.invalidate();
    }
    if (response.status === 409 && response.text.includes('unionErrors')) {
      this.logger.debug(`Schema validation options from ${endpoint}: ${response.text.slice(0, 500)}`);
    }

    this.logger.error(`❌ ${endpoint} rejected the request (${response.status}): ${message}`);
    return this.failure(model, {
      kind: 'rejected',
      message,
      status: response.status,
      endpoint,
      details,
    });
  }

  private failure(model: string, error: GatewayError): GatewayResult {
    return { success: false, response: '', modelUsed: model, error };
  }
}
