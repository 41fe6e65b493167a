import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { config, validateConfig } from './core/config';
import { logger } from './core/logger';
import { AppError, getErrorMessage } from './core/errors';
import { basicAuth } from './middleware/auth';
import { Runtime, createRuntime } from './runtime';
import { previewText } from './utils/security';

const SERVICE_VERSION = '1.0.0';

// body-parser reports unreadable bodies (bad JSON, too large, bad charset)
// with a 4xx `status`/`statusCode` on the error
function clientErrorStatus(error: Error): number | null {
  const status =
    'status' in error && typeof error.status === 'number'
      ? error.status
      : 'statusCode' in error && typeof error.statusCode === 'number'
        ? error.statusCode
        : null;
  return status !== null && status >= 400 && status < 500 ? status : null;
}

export function createApp(runtime: Runtime) {
  const app = express();
  const requireAuth = basicAuth(config.auth);

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    logger.info('Request', { method: req.method, path: req.path, ip: req.ip });
    next();
  });

  app.get('/', (req: Request, res: Response) => {
    res.json({
      message: 'Hybrid retrieval API is running',
      status: 'active',
      version: SERVICE_VERSION,
      services: {
        graph: runtime.graphDb.isConnected() ? 'connected' : 'fallback_mode',
        web_search: runtime.webSearch.isConfigured() ? 'configured' : 'mock_mode',
        llm: runtime.llm.isConfigured() ? 'available' : 'fallback_mode',
        authentication: 'enabled',
      },
      endpoints: {
        health: '/health',
        status: '/status',
        tools: '/tools',
        agent_query: '/api/v1/agent/query',
      },
    });
  });

  app.get('/health', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const graphHealth = await runtime.graphDb.healthCheck();
      const missing = validateConfig();

      res.json({
        status: missing.length > 0 ? 'degraded' : 'healthy',
        version: SERVICE_VERSION,
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        components: {
          api: 'healthy',
          graph: graphHealth.status,
          web_search: runtime.webSearch.isConfigured() ? 'configured' : 'mock_mode',
          llm: runtime.llm.isConfigured() ? 'available' : 'fallback',
          similarity_cache: runtime.similarityCache.stats(),
        },
        details: {
          graph_message: graphHealth.message,
          graph_version: graphHealth.version ?? 'unknown',
        },
        ...(missing.length > 0 ? { config_warnings: missing } : {}),
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/status', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const graphHealth = await runtime.graphDb.healthCheck();
      res.json({
        system: {
          version: SERVICE_VERSION,
          environment: config.server.env,
          uptime: process.uptime(),
          node: process.version,
        },
        services: {
          graph: { connected: runtime.graphDb.isConnected(), status: graphHealth.status },
          llm: { available: runtime.llm.isConfigured(), model: config.models.generator },
          web_search: { configured: runtime.webSearch.isConfigured() },
          similarity_cache: runtime.similarityCache.stats(),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/tools', requireAuth, (req: Request, res: Response) => {
    const tools = [
      {
        name: 'search_knowledge_graph',
        description: 'Search the knowledge graph for concepts and their relationships',
        available: true,
        mode: runtime.graphDb.isConnected() ? 'live' : 'fallback',
      },
      {
        name: 'get_related_concepts',
        description: 'List concepts one relationship away from a named concept',
        available: runtime.graphDb.isConnected(),
      },
      {
        name: 'search_internet',
        description: 'Search the web for current information',
        available: true,
        mode: runtime.webSearch.isConfigured() ? 'live' : 'mock',
      },
      {
        name: 'search_news',
        description: 'Search recent news articles',
        available: true,
        mode: runtime.webSearch.isConfigured() ? 'live' : 'mock',
      },
      {
        name: 'semantic_search',
        description: 'Search previously fetched documents by embedding similarity',
        available: true,
      },
    ];

    res.json({ status: 'success', tools, count: tools.length });
  });

  app.post('/api/v1/agent/query', requireAuth, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { query, options, context } = req.body ?? {};

      logger.info('Agent query', {
        user: res.locals.user,
        query: typeof query === 'string' ? previewText(query) : undefined,
      });

      const result = await runtime.agent.processQuery(query, options, context);

      if (result.status === 'error') {
        res.status(result.error.code === 'INVALID_REQUEST' ? 400 : 500).json(result);
        return;
      }

      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  app.use((error: Error, req: Request, res: Response, next: NextFunction) => {
    if (error instanceof AppError && error.statusCode < 500) {
      logger.warn('Request rejected', { path: req.path, code: error.code, error: error.message });
      res.status(error.statusCode).json({
        status: 'error',
        error: { code: error.code, message: error.message },
      });
      return;
    }

    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== null) {
      logger.warn('Malformed request', { path: req.path, status: clientStatus, error: error.message });
      res.status(400).json({
        status: 'error',
        error: { code: 'INVALID_REQUEST', message: 'Request body could not be parsed' },
      });
      return;
    }

    logger.error('Unhandled request error', { path: req.path, error: error.message, stack: error.stack });
    res.status(500).json({
      status: 'error',
      error: {
        code: 'INTERNAL_ERROR',
        message: 'Internal server error occurred while processing your request.',
      },
    });
  });

  return app;
}

async function startServer() {
  const runtime = await createRuntime();
  const app = createApp(runtime);

  const server = app.listen(config.server.port, () => {
    logger.info('Server started', {
      port: config.server.port,
      env: config.server.env,
      nodeVersion: process.version,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close();
    runtime
      .shutdown()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Shutdown failed', { error: getErrorMessage(error) });
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  startServer().catch((error) => {
    logger.error('Failed to start server', { error: getErrorMessage(error) });
    process.exit(1);
  });
}
