export const LlmEndpoints = {
  AUTH_TOKEN: '/auth-engine-api/v1/api-key/token',
  AUTH_HEALTH: '/auth-engine-api/v1/health',
  MODELS: '/ai-orchestration-api/v1/models',
  // Equivalent chat paths across service versions, tried in this order
  CHAT_COMPLETION_VARIANTS: [
    '/ai-orchestration-api/v1/openai/chat/completions',
    '/ai-orchestration-api/v1/chat/completions',
    '/ai-orchestration-api/v1/openai/completions',
  ],
} as const;

export const TENANT_HEADER = 'FlowTenant';
export const AGENT_HEADER = 'FlowAgent';

// A validation rejection still proves the chat endpoint is reachable
export const HEALTHY_PROBE_STATUSES: readonly number[] = [200, 400, 409];
