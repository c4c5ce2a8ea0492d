export interface AccessToken {
  readonly accessToken: string;
  readonly expiresIn: number;
  readonly issuedAt: number;
  readonly expiresAt: number;
}

export type ModelCapability = 'chat' | 'embedding';

export interface ModelDescriptor {
  name: string;
  capability: ModelCapability;
  // Entry as returned by the listing endpoint (or the fallback set)
  raw: unknown;
}

export type ModelSource = 'remote' | 'fallback';

export type GatewayErrorKind = 'authentication' | 'rejected' | 'schema' | 'unavailable';

export interface GatewayError {
  kind: GatewayErrorKind;
  message: string;
  status?: number;
  endpoint?: string;
  details?: unknown;
}

export interface GatewayResult {
  success: boolean;
  response: string;
  modelUsed: string;
  endpoint?: string;
  error?: GatewayError;
}

export interface GenerateRequest {
  message: string;
  context: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  agentName?: string;
}
