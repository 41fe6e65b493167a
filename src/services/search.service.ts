import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { RetrievalError, getErrorMessage } from '../core/errors';
import { withTimeout } from '../utils/timeout';

export type SearchDepth = 'basic' | 'advanced';

export interface WebSearchResult {
  title?: string;
  content?: string;
  url?: string;
  score?: number;
  published_date?: string;
}

export interface WebSearchResponse {
  results: WebSearchResult[];
}

/**
 * Boundary to the live web-search backend. A missing API key is an expected
 * configuration, reported through `isConfigured`.
 */
export interface WebSearchClient {
  isConfigured(): boolean;
  search(query: string, maxResults: number, depth: SearchDepth): Promise<WebSearchResponse>;
}

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        content: z.string().nullish(),
        url: z.string().nullish(),
        score: z.coerce.number().nullish(),
        published_date: z.string().nullish(),
      })
    )
    .default([]),
});

export interface TavilySettings {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export class TavilySearchService implements WebSearchClient {
  private client: AxiosInstance;

  constructor(
    private settings: TavilySettings = {
      apiKey: config.tavily.apiKey,
      baseUrl: config.tavily.baseUrl,
      timeoutMs: config.execution.externalTimeout,
    }
  ) {
    this.client = axios.create({
      baseURL: settings.baseUrl,
      headers: {
        'Authorization': `Bearer ${settings.apiKey}`,
        'Content-Type': 'application/json',
      },
      timeout: settings.timeoutMs,
    });
  }

  isConfigured(): boolean {
    return Boolean(this.settings.apiKey);
  }

  async search(query: string, maxResults: number, depth: SearchDepth): Promise<WebSearchResponse> {
    if (!this.isConfigured()) {
      throw new RetrievalError('Web search is not configured');
    }

    try {
      logger.debug('Tavily request', { depth, maxResults });

      const response = await withTimeout(
        this.client.post('/search', {
          query,
          max_results: maxResults,
          search_depth: depth,
        }),
        this.settings.timeoutMs,
        'Tavily search'
      );

      const parsed = TavilyResponseSchema.parse(response.data);

      return {
        results: parsed.results.map(item => ({
          title: item.title ?? undefined,
          content: item.content ?? undefined,
          url: item.url ?? undefined,
          score: item.score ?? undefined,
          published_date: item.published_date ?? undefined,
        })),
      };
    } catch (error) {
      logger.error('Tavily search failed', {
        error: getErrorMessage(error),
        status: axios.isAxiosError(error) ? error.response?.status : undefined,
      });
      throw new RetrievalError(`Web search failed: ${getErrorMessage(error)}`);
    }
  }
}
