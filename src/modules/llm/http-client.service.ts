// modules/llm/http-client.service.ts
import { Injectable } from '@nestjs/common';
import { TransportError } from './errors';
import { describeError } from '../../common/utils/error.util';

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  text: string;
}

/**
 * Thin fetch wrapper. Every HTTP status is returned to the caller; only
 * network failures and timeouts throw, as TransportError.
 */
@Injectable()
export class HttpClientService {
  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });
      const text = await response.text();
      return { status: response.status, text };
    } catch (error) {
      const isAbort = error instanceof Error && error.name === 'AbortError';
      const message = isAbort
        ? `Request to ${request.url} timed out after ${request.timeoutMs}ms`
        : `Request to ${request.url} failed: ${describeError(error)}`;
      throw new TransportError(message, request.url, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
