export type DocumentKind = 'graph' | 'graph_related' | 'internet' | 'news' | 'semantic';

export interface Relationship {
  relation: string;
  target: string;
}

/**
 * A single retrieved unit of information. Treated as immutable once a
 * retriever has produced it; the similarity cache hands out copies.
 */
export interface SourceDocument {
  readonly kind: DocumentKind;
  readonly title: string;
  readonly content: string;
  /** Stable locator: graph node id, URL or cache slot */
  readonly reference: string;
  /** Heuristic relevance in [0, 1], not a calibrated probability */
  readonly confidence: number;
  readonly category?: string;
  readonly publishedDate?: string;
  readonly relationships?: readonly Relationship[];
  /** Provenance tag such as `tavily`, `mock` or `semantic_search` */
  readonly source?: string;
}

export interface RunOptions {
  useGraph: boolean;
  useInternet: boolean;
  maxResults: number;
}

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  useGraph: true,
  useInternet: true,
  maxResults: 5,
};

export type QueryIntentType = 'definition' | 'instructions' | 'comparison' | 'information_request';
export type QueryComplexity = 'low' | 'medium' | 'high';
export type ExpectedSource = 'graph' | 'internet';

export interface QueryAnalysis {
  intent: QueryIntentType;
  complexity: QueryComplexity;
  needsFacts: boolean;
  needsCurrentInfo: boolean;
  expectedSources: ExpectedSource[];
}

export interface RoutingDecision {
  searchGraph: boolean;
  searchInternet: boolean;
}

export interface FormattedSource {
  title: string;
  reference: string;
  type: DocumentKind;
  confidence: number;
}

export interface StructuredOutput {
  key_points: string[];
  summary: string;
  reasoning: string[];
  confidence: number;
}

export interface SynthesisResult {
  answer: string;
  sources: FormattedSource[];
  structuredOutput: StructuredOutput;
  /** Which branch produced the answer */
  mode: 'generated' | 'raw_text' | 'fallback' | 'insufficient';
}

export type ResponseErrorCode = 'INVALID_REQUEST' | 'PROCESSING_ERROR' | 'INTERNAL_ERROR';

export interface AgentSuccessResponse {
  status: 'success';
  response: {
    answer: string;
    sources: FormattedSource[];
    structured_output: StructuredOutput;
  };
  context?: Record<string, unknown>;
}

export interface AgentErrorResponse {
  status: 'error';
  error: {
    code: ResponseErrorCode;
    message: string;
  };
}

export type AgentResponse = AgentSuccessResponse | AgentErrorResponse;
