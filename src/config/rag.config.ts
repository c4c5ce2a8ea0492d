const parseList = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) return fallback;
  const items = value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
};

export default () => ({
  llm: {
    baseUrl: process.env.LLM_BASE_URL || '',
    tenant: process.env.LLM_TENANT || '',
    clientId: process.env.LLM_CLIENT_ID || '',
    clientSecret: process.env.LLM_CLIENT_SECRET || '',
    appToAccess: process.env.LLM_APP_TO_ACCESS || 'llm-api',
    agentName: process.env.LLM_AGENT_NAME || 'llm-chatbot-rag',
    requestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '30000', 10),
    authTimeoutMs: parseInt(process.env.LLM_AUTH_TIMEOUT_MS || '10000', 10),
    healthTimeoutMs: parseInt(process.env.LLM_HEALTH_TIMEOUT_MS || '10000', 10),
    tokenExpirySkewSeconds: parseInt(process.env.LLM_TOKEN_EXPIRY_SKEW_SECONDS || '0', 10),
  },
  rag: {
    documentsPath: process.env.RAG_DOCUMENTS_PATH || './documents',
    supportedFileTypes: parseList(process.env.RAG_SUPPORTED_FILE_TYPES, ['.txt', '.md', '.pdf']),
    recurseFolders: process.env.RAG_RECURSE_FOLDERS === 'true',
    topK: parseInt(process.env.RAG_TOP_K || '3', 10),
    maxTokens: parseInt(process.env.RAG_MAX_TOKENS || '1000', 10),
    temperature: parseFloat(process.env.RAG_TEMPERATURE || '0.7'),
    contextPreviewLength: parseInt(process.env.RAG_CONTEXT_PREVIEW_LENGTH || '200', 10),
  },
  embedding: {
    dimension: parseInt(process.env.EMBEDDING_DIMENSION || '384', 10),
  },
});
