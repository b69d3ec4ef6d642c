import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseFloat(val) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),

  // ───── LLM Providers ─────
  openai: {
    apiKey: optional('OPENAI_API_KEY', ''),
    model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
    maxTokens: optionalInt('OPENAI_MAX_TOKENS', 500),
    temperature: optionalFloat('OPENAI_TEMPERATURE', 0.7),
    timeoutMs: optionalInt('OPENAI_TIMEOUT_MS', 20000),
  },

  anthropic: {
    apiKey: optional('ANTHROPIC_API_KEY', ''),
    model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
    maxTokens: optionalInt('ANTHROPIC_MAX_TOKENS', 500),
    temperature: optionalFloat('ANTHROPIC_TEMPERATURE', 0.7),
    timeoutMs: optionalInt('ANTHROPIC_TIMEOUT_MS', 20000),
  },

  gemini: {
    apiKey: optional('GEMINI_API_KEY', ''),
    model: optional('GEMINI_MODEL', 'gemini-1.5-flash'),
    maxTokens: optionalInt('GEMINI_MAX_TOKENS', 500),
    temperature: optionalFloat('GEMINI_TEMPERATURE', 0.7),
    timeoutMs: optionalInt('GEMINI_TIMEOUT_MS', 20000),
  },

  // ───── LLM Routing ─────
  llm: {
    primaryProvider: optional('LLM_PRIMARY_PROVIDER', 'openai'),
    secondaryProvider: optional('LLM_SECONDARY_PROVIDER', ''),
    tertiaryProvider: optional('LLM_TERTIARY_PROVIDER', ''),
    /** Provider for classification calls; empty uses the primary chain */
    classifierProvider: optional('LLM_CLASSIFIER_PROVIDER', ''),
    /** Temperature for classification calls; generation uses the provider setting */
    classifierTemperature: optionalFloat('LLM_CLASSIFIER_TEMPERATURE', 0.2),
  },

  redis: {
    /** Empty means in-memory stores */
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'encore:'),
    conversationTtlSeconds: optionalInt('CONVERSATION_TTL_SECONDS', 7 * 24 * 60 * 60),
  },

  whatsapp: {
    apiToken: optional('WHATSAPP_API_TOKEN', ''),
    phoneNumberId: optional('WHATSAPP_PHONE_NUMBER_ID', ''),
    apiVersion: optional('WHATSAPP_API_VERSION', 'v18.0'),
    verifyToken: optional('WHATSAPP_VERIFY_TOKEN', ''),
    appSecret: optional('WHATSAPP_APP_SECRET', ''),
  },

  ticketing: {
    /** Empty means the in-memory mock */
    baseUrl: optional('TICKETING_API_URL', ''),
    apiToken: optional('TICKETING_API_TOKEN', ''),
  },

  security: {
    adminApiKey: optional('ADMIN_API_KEY', ''),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },

  rag: {
    enabled: optionalBool('RAG_ENABLED', false),
    embeddingModel: optional('RAG_EMBEDDING_MODEL', 'text-embedding-3-small'),
  },

  defaultTenantId: optional('DEFAULT_TENANT_ID', 'default'),

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
} as const;
