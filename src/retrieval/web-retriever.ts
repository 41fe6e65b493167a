import { logger } from '../core/logger';
import { getErrorMessage } from '../core/errors';
import { SearchDepth, WebSearchClient, WebSearchResult } from '../services/search.service';
import { DocumentKind, SourceDocument } from '../types';
import { SimilarityCache } from './similarity-cache';

const DEFAULT_SCORE = 70;

interface SearchProfile {
  kind: Extract<DocumentKind, 'internet' | 'news'>;
  depth: SearchDepth;
  confidenceCap: number;
  source: string;
}

const WEB_PROFILE: SearchProfile = {
  kind: 'internet',
  depth: 'advanced',
  confidenceCap: 0.9,
  source: 'tavily',
};

const NEWS_PROFILE: SearchProfile = {
  kind: 'news',
  depth: 'basic',
  confidenceCap: 0.85,
  source: 'tavily_news',
};

/**
 * Live web search. Never rejects: missing credentials and backend failures
 * both resolve to templated mock documents. Every live result is also
 * handed to the similarity cache.
 */
export class WebRetriever {
  constructor(
    private client: WebSearchClient,
    private cache: SimilarityCache
  ) {}

  async search(query: string, maxResults: number): Promise<SourceDocument[]> {
    if (!this.client.isConfigured()) {
      return mockInternetDocuments(query, maxResults);
    }

    try {
      const documents = await this.runSearch(query, query, maxResults, WEB_PROFILE);
      logger.info('Internet search completed', { results: documents.length });
      return documents;
    } catch (error) {
      logger.warn('Internet search failed - using mock data', { error: getErrorMessage(error) });
      return mockInternetDocuments(query, maxResults);
    }
  }

  async searchNews(query: string, maxResults: number): Promise<SourceDocument[]> {
    if (!this.client.isConfigured()) {
      return mockNewsDocuments(query, maxResults);
    }

    try {
      const documents = await this.runSearch(query, `news ${query} 2024`, maxResults, NEWS_PROFILE);
      logger.info('News search completed', { results: documents.length });
      return documents;
    } catch (error) {
      logger.warn('News search failed - using mock data', { error: getErrorMessage(error) });
      return mockNewsDocuments(query, maxResults);
    }
  }

  private async runSearch(
    query: string,
    backendQuery: string,
    maxResults: number,
    profile: SearchProfile
  ): Promise<SourceDocument[]> {
    const response = await this.client.search(backendQuery, maxResults, profile.depth);
    const documents = response.results.map(item => toWebDocument(item, profile));

    for (const document of documents) {
      await this.cache.insert(document);
    }

    logger.debug('Web results cached', { query, cached: documents.length });
    return documents;
  }
}

function toWebDocument(item: WebSearchResult, profile: SearchProfile): SourceDocument {
  const score = item.score ?? DEFAULT_SCORE;
  return {
    kind: profile.kind,
    title: item.title || 'No title',
    content: item.content ?? '',
    reference: item.url ?? '',
    confidence: Math.min(profile.confidenceCap, Math.max(0, score / 100)),
    publishedDate: item.published_date ?? '',
    source: profile.source,
  };
}

export function mockInternetDocuments(query: string, maxResults: number): SourceDocument[] {
  const documents: SourceDocument[] = [
    {
      kind: 'internet',
      title: `Research about ${query}`,
      content: `This is mock content about ${query}. A configured search backend would return live web results here.`,
      reference: 'https://example.com/mock-data',
      confidence: 0.75,
      publishedDate: '2024-01-01',
      source: 'mock',
    },
    {
      kind: 'internet',
      title: `Latest developments in ${query}`,
      content: `Mock summary of recent advancements in ${query}. This shows the response structure when no search API is configured.`,
      reference: 'https://example.com/mock-news',
      confidence: 0.7,
      publishedDate: '2024-01-01',
      source: 'mock',
    },
  ];
  return documents.slice(0, Math.max(0, maxResults));
}

export function mockNewsDocuments(query: string, maxResults: number): SourceDocument[] {
  const documents: SourceDocument[] = [
    {
      kind: 'news',
      title: `Breaking: New developments in ${query}`,
      content: `This is mock news content about ${query}. A configured search backend would return recent news here.`,
      reference: 'https://example.com/mock-news',
      confidence: 0.8,
      publishedDate: '2024-01-15',
      source: 'mock_news',
    },
  ];
  return documents.slice(0, Math.max(0, maxResults));
}
