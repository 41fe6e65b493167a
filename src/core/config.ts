import dotenv from 'dotenv';

dotenv.config();

export const config = {
  server: {
    port: parseInt(process.env.PORT || '8000'),
    env: process.env.NODE_ENV || 'development',
  },
  auth: {
    username: process.env.API_USER || 'agent',
    password: process.env.API_PASS || 'secret',
  },
  neo4j: {
    uri: process.env.NEO4J_URI || 'bolt://localhost:7687',
    username: process.env.NEO4J_USER || 'neo4j',
    password: process.env.NEO4J_PASSWORD || '',
  },
  tavily: {
    apiKey: process.env.TAVILY_API_KEY || '',
    baseUrl: process.env.TAVILY_BASE_URL || 'https://api.tavily.com',
  },
  openrouter: {
    apiKey: process.env.OPENROUTER_API_KEY || '',
    baseUrl: process.env.OPENROUTER_BASE_URL || 'https://openrouter.ai/api/v1',
  },
  models: {
    generator: process.env.GENERATOR_MODEL || 'anthropic/claude-3.5-haiku',
  },
  openai: {
    apiKey: process.env.OPENAI_API_KEY || '',
    embeddingModel: process.env.EMBEDDING_MODEL || 'text-embedding-3-small',
  },
  cache: {
    path: process.env.SIMILARITY_CACHE_PATH || 'vector_store/similarity-cache.json',
    persistEvery: parseInt(process.env.CACHE_PERSIST_EVERY || '5'),
    localDimension: parseInt(process.env.LOCAL_EMBEDDING_DIMENSION || '256'),
  },
  execution: {
    // Applied to every outbound call: graph backend, search, embeddings, generation
    externalTimeout: parseInt(process.env.EXTERNAL_TIMEOUT || '30000'),
    maxIterations: 5,
    recursionLimit: parseInt(process.env.RECURSION_LIMIT || '25'),
  },
  defaults: {
    maxResults: 5,
  },
};

/**
 * Lists credentials that are absent. Every entry has a fallback path, so
 * callers report these as warnings, never as startup failures.
 */
export function validateConfig(): string[] {
  const missing: string[] = [];
  if (!config.tavily.apiKey) missing.push('TAVILY_API_KEY');
  if (!config.openrouter.apiKey) missing.push('OPENROUTER_API_KEY');
  if (!config.neo4j.password) missing.push('NEO4J_PASSWORD');
  return missing;
}
