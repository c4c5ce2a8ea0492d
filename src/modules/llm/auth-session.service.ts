// modules/llm/auth-session.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpClientService } from './http-client.service';
import { AuthenticationError } from './errors';
import { LlmEndpoints, TENANT_HEADER } from './llm.endpoints';
import { AccessToken } from './interfaces/gateway.interface';
import { parseTokenResponse } from './dto/token-response.dto';
import { describeError } from '../../common/utils/error.util';

export function createAccessToken(
  accessToken: string,
  expiresIn: number,
  issuedAt: number = Date.now(),
): AccessToken {
  return {
    accessToken,
    expiresIn,
    issuedAt,
    expiresAt: issuedAt + expiresIn * 1000,
  };
}

/**
 * Acquires and caches the bearer token for the remote LLM service.
 *
 * Unauthenticated -> Authenticated on a successful token exchange; back to
 * Unauthenticated when an exchange fails or a caller invalidates the token.
 */
@Injectable()
export class AuthSessionService {
  private readonly logger = new Logger(AuthSessionService.name);
  private token: AccessToken | null = null;

  private readonly baseUrl: string;
  private readonly tenant: string;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly appToAccess: string;
  private readonly timeoutMs: number;
  private readonly expirySkewMs: number;

  constructor(
    private configService: ConfigService,
    private httpClient: HttpClientService,
  ) {
    this.baseUrl = (this.configService.get<string>('llm.baseUrl') || '').replace(/\/+$/, '');
    this.tenant = this.configService.get<string>('llm.tenant') || '';
    this.clientId = this.configService.get<string>('llm.clientId') || '';
    this.clientSecret = this.configService.get<string>('llm.clientSecret') || '';
    this.appToAccess = this.configService.get<string>('llm.appToAccess') || 'llm-api';
    this.timeoutMs = this.configService.get<number>('llm.authTimeoutMs') || 10000;
    this.expirySkewMs = (this.configService.get<number>('llm.tokenExpirySkewSeconds') || 0) * 1000;
  }

  /**
   * Exchange client credentials for a token. Never throws.
   */
  async authenticate(): Promise<boolean> {
    const url = `${this.baseUrl}${LlmEndpoints.AUTH_TOKEN}`;

    try {
      const response = await this.httpClient.send({
        method: 'POST',
        url,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          [TENANT_HEADER]: this.tenant,
        },
        body: {
          clientId: this.clientId,
          clientSecret: this.clientSecret,
          appToAccess: this.appToAccess,
        },
        timeoutMs: this.timeoutMs,
      });

      if (response.status !== 200) {
        this.token = null;
        this.logger.error(`❌ Authentication failed with status ${response.status}`);
        return false;
      }

      const payload = parseTokenResponse(response.text);
      if (!payload) {
        this.token = null;
        this.logger.error('❌ Authentication returned a malformed token payload');
        return false;
      }

      this.token = createAccessToken(payload.access_token, payload.expires_in ?? 0);
      this.logger.log(`🔑 Authenticated (token valid for ${this.token.expiresIn}s)`);
      return true;
    } catch (error) {
      this.token = null;
      this.logger.error(`❌ Authentication failed: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Cached token if still valid, otherwise a fresh one.
   * @throws AuthenticationError when a new token cannot be obtained
   */
  async ensureToken(): Promise<AccessToken> {
    const cached = this.token;
    if (cached && !this.isExpired(cached)) return cached;

    if (cached) this.logger.log('🔄 Access token expired, re-authenticating');

    const authenticated = await this.authenticate();
    const token = this.token;
    if (!authenticated || !token) {
      throw new AuthenticationError();
    }
    return token;
  }

  /**
   * Probe the auth health endpoint with the cached token. A failed probe does
   * not clear the cache; callers decide whether to invalidate.
   */
  async checkValidity(): Promise<boolean> {
    const token = this.token;
    if (!token) return false;

    try {
      const response = await this.httpClient.send({
        method: 'GET',
        url: `${this.baseUrl}${LlmEndpoints.AUTH_HEALTH}`,
        headers: { Authorization: `Bearer ${token.accessToken}` },
        timeoutMs: this.timeoutMs,
      });

      if (response.status === 200) return true;

      this.logger.warn(`Token validity check returned status ${response.status}`);
      return false;
    } catch (error) {
      this.logger.warn(`Token validity check failed: ${describeError(error)}`);
      return false;
    }
  }

  invalidate(): void {
    if (this.token) this.logger.log('🔒 Access token invalidated');
    this.token = null;
  }

  getToken(): AccessToken | null {
    return this.token;
  }

  isAuthenticated(): boolean {
    return this.token !== null && !this.isExpired(this.token);
  }

  private isExpired(token: AccessToken): boolean {
    return Date.now() >= token.expiresAt - this.expirySkewMs;
  }
}
