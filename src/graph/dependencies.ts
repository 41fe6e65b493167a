import { SourceDocument, SynthesisResult } from '../types';

export interface DocumentSearch {
  search(query: string, maxResults: number): Promise<SourceDocument[]>;
}

export interface SemanticLookup {
  query(text: string, k: number): Promise<SourceDocument[]>;
}

export interface Synthesizer {
  synthesize(
    query: string,
    documents: readonly SourceDocument[],
    reasoning?: readonly string[]
  ): Promise<SynthesisResult>;
}

/**
 * Everything the workflow talks to, constructed once at startup and passed
 * in so tests can substitute doubles.
 */
export interface WorkflowDependencies {
  graphRetriever: DocumentSearch;
  webRetriever: DocumentSearch;
  similarityCache: SemanticLookup;
  synthesizer: Synthesizer;
  maxIterations?: number;
  /** Clock used for the year-token recency check */
  now?: () => Date;
}
