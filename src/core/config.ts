import dotenv from 'dotenv';

dotenv.config();

export type PlanDrafterKind = 'rules' | 'llm';

function drafterFromEnv(value: string | undefined): PlanDrafterKind {
  return value === 'llm' ? 'llm' : 'rules';
}

export const config = {
  mongodb: {
    uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/shipments',
    dbName: process.env.MONGODB_DB_NAME || 'shipments',
  },
  search: {
    endpoint: process.env.SEARCH_ENDPOINT || '',
    apiKey: process.env.SEARCH_API_KEY || '',
    indexName: process.env.SEARCH_INDEX_NAME || 'shipments',
    apiVersion: process.env.SEARCH_API_VERSION || '2024-07-01',
    topK: parseInt(process.env.SEARCH_TOP_K || '5'),
    vectorK: parseInt(process.env.SEARCH_VECTOR_K || '30'),
    vectorField: process.env.SEARCH_VECTOR_FIELD || 'text_vector',
    idField: process.env.SEARCH_ID_FIELD || 'document_id',
  },
  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
    embeddingModel: process.env.EMBEDDING_MODEL || 'text-embedding-3-small',
    plannerModel: process.env.PLANNER_MODEL || 'gpt-4o-mini',
  },
  server: {
    port: parseInt(process.env.PORT || '3002'),
    env: process.env.NODE_ENV || 'development',
  },
  execution: {
    // Timeout settings (in milliseconds)
    searchTimeout: parseInt(process.env.SEARCH_TIMEOUT || '10000'),
    tabularTimeout: parseInt(process.env.TABULAR_TIMEOUT || '15000'),
    llmTimeout: parseInt(process.env.LLM_TIMEOUT || '30000'),
    totalTimeout: parseInt(process.env.TOTAL_TIMEOUT || '60000'),
  },
  session: {
    ttlMs: parseInt(process.env.SESSION_TTL_MS || '3600000'), // 1 hour
    maxTurns: parseInt(process.env.SESSION_MAX_TURNS || '5'),
  },
  analytics: {
    drafter: drafterFromEnv(process.env.ANALYTICS_DRAFTER),
    defaultRowLimit: parseInt(process.env.ANALYTICS_DEFAULT_LIMIT || '50'),
    maxRowLimit: parseInt(process.env.ANALYTICS_MAX_LIMIT || '1000'),
  },
  scope: {
    hierarchyPath: process.env.CONSIGNEE_HIERARCHY_PATH || '',
  },
  logging: {
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'error' : 'info'),
  },
};

export type AppConfig = typeof config;
