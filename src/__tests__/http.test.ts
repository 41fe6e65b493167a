import type { Server } from 'http';
import axios, { AxiosRequestConfig } from 'axios';
import { createApp } from '../index';
import { config } from '../core/config';
import { HybridRetrievalAgent } from '../agent';
import { Runtime } from '../runtime';
import { Neo4jGraphService } from '../services/graph-db.service';
import { TavilySearchService } from '../services/search.service';
import { LLMService } from '../services/llm.service';
import { HashingEmbedder } from '../services/embedding.service';
import { SimilarityCache } from '../retrieval/similarity-cache';
import { GraphRetriever } from '../retrieval/graph-retriever';
import { WebRetriever } from '../retrieval/web-retriever';
import { AnswerSynthesizer } from '../synthesis/answer-synthesizer';

// Every backend left unconfigured, so requests are answered from fallbacks
function offlineRuntime(): Runtime {
  const graphDb = new Neo4jGraphService({ uri: 'bolt://localhost:7687', username: 'neo4j', password: '' });
  const webSearch = new TavilySearchService({ apiKey: '', baseUrl: 'http://localhost', timeoutMs: 1000 });
  const llm = new LLMService({ apiKey: '', baseUrl: 'http://localhost', model: 'test-model', timeoutMs: 1000 });
  const similarityCache = new SimilarityCache(new HashingEmbedder(16), { path: null });
  const graphRetriever = new GraphRetriever(graphDb);
  const webRetriever = new WebRetriever(webSearch, similarityCache);
  const synthesizer = new AnswerSynthesizer(llm);
  const agent = new HybridRetrievalAgent({ graphRetriever, webRetriever, similarityCache, synthesizer });

  return {
    agent,
    graphDb,
    webSearch,
    llm,
    similarityCache,
    graphRetriever,
    webRetriever,
    synthesizer,
    async shutdown() {},
  };
}

describe('HTTP API', () => {
  let server: Server;
  let baseURL: string;

  const authorized: AxiosRequestConfig = {
    auth: { username: config.auth.username, password: config.auth.password },
    headers: { 'Content-Type': 'application/json' },
    validateStatus: () => true,
  };

  beforeAll(async () => {
    server = createApp(offlineRuntime()).listen(0, '127.0.0.1');
    await new Promise<void>(resolve => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseURL = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  test('rejects a truncated JSON body as an invalid request', async () => {
    const response = await axios.post(`${baseURL}/api/v1/agent/query`, '{"query": "What is AI?",', {
      ...authorized,
      // send the text as-is instead of letting axios re-encode it
      transformRequest: [(data: string) => data],
    });

    expect(response.status).toBe(400);
    expect(response.data).toEqual({
      status: 'error',
      error: { code: 'INVALID_REQUEST', message: 'Request body could not be parsed' },
    });
  });

  test('rejects an empty query with 400', async () => {
    const response = await axios.post(`${baseURL}/api/v1/agent/query`, { query: '' }, authorized);

    expect(response.status).toBe(400);
    expect(response.data.error).toEqual({ code: 'INVALID_REQUEST', message: 'Query cannot be empty' });
  });

  test('requires credentials', async () => {
    const response = await axios.post(
      `${baseURL}/api/v1/agent/query`,
      { query: 'What is AI?' },
      { validateStatus: () => true }
    );

    expect(response.status).toBe(401);
    expect(response.data.error.code).toBe('AUTH_ERROR');
  });

  test('answers a query from fallback sources', async () => {
    const response = await axios.post(
      `${baseURL}/api/v1/agent/query`,
      { query: 'What is machine learning?', options: { use_internet: false } },
      authorized
    );

    expect(response.status).toBe(200);
    expect(response.data.status).toBe('success');
    expect(response.data.response.sources).toEqual([
      { title: 'Machine Learning', reference: 'graph:fallback:ml001', type: 'graph', confidence: 0.82 },
    ]);
  });
});
