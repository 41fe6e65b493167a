import { config, validateConfig } from './core/config';
import { logger } from './core/logger';
import { getErrorMessage } from './core/errors';
import { HybridRetrievalAgent } from './agent';
import { Neo4jGraphService } from './services/graph-db.service';
import { TavilySearchService } from './services/search.service';
import { LLMService } from './services/llm.service';
import { createEmbedder } from './services/embedding.service';
import { SimilarityCache } from './retrieval/similarity-cache';
import { GraphRetriever } from './retrieval/graph-retriever';
import { WebRetriever } from './retrieval/web-retriever';
import { AnswerSynthesizer } from './synthesis/answer-synthesizer';

export interface Runtime {
  agent: HybridRetrievalAgent;
  graphDb: Neo4jGraphService;
  webSearch: TavilySearchService;
  llm: LLMService;
  similarityCache: SimilarityCache;
  graphRetriever: GraphRetriever;
  webRetriever: WebRetriever;
  synthesizer: AnswerSynthesizer;
  shutdown(): Promise<void>;
}

/**
 * Builds the process-wide collaborators once: probes the graph backend,
 * restores the similarity cache and wires everything into the agent.
 */
export async function createRuntime(): Promise<Runtime> {
  const missing = validateConfig();
  if (missing.length > 0) {
    logger.warn('Missing configuration - fallback mode for affected sources', { missing });
  }

  const graphDb = new Neo4jGraphService();
  await graphDb.connect();

  const similarityCache = new SimilarityCache(createEmbedder(), {
    path: config.cache.path,
    persistEvery: config.cache.persistEvery,
  });
  await similarityCache.load();

  const webSearch = new TavilySearchService();
  const llm = new LLMService();
  if (!llm.isConfigured()) {
    logger.warn('Text generation not configured - answers use fallback mode');
  }

  const graphRetriever = new GraphRetriever(graphDb);
  const webRetriever = new WebRetriever(webSearch, similarityCache);
  const synthesizer = new AnswerSynthesizer(llm);

  const agent = new HybridRetrievalAgent({
    graphRetriever,
    webRetriever,
    similarityCache,
    synthesizer,
    maxIterations: config.execution.maxIterations,
  });

  logger.info('Runtime initialized', {
    graph: graphDb.isConnected() ? 'connected' : 'fallback_mode',
    webSearch: webSearch.isConfigured() ? 'configured' : 'mock_mode',
    llm: llm.isConfigured() ? 'available' : 'fallback_mode',
    cache: similarityCache.stats(),
  });

  return {
    agent,
    graphDb,
    webSearch,
    llm,
    similarityCache,
    graphRetriever,
    webRetriever,
    synthesizer,
    async shutdown() {
      try {
        await similarityCache.flush();
      } catch (error) {
        logger.error('Failed to flush similarity cache', { error: getErrorMessage(error) });
      }
      await graphDb.close();
    },
  };
}
