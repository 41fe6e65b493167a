import { QueryAnalysis, RoutingDecision, RunOptions } from '../types';

const DEFINITION_KEYWORDS = ['what is', 'define', 'explain'];
const INSTRUCTION_KEYWORDS = ['how to', 'steps', 'guide'];
const COMPARISON_KEYWORDS = ['compare', 'difference', 'vs'];
const COMPLEXITY_KEYWORDS = ['complex', 'advanced', 'detailed'];
const CURRENT_INFO_KEYWORDS = ['latest', 'recent', 'news', 'update'];

const GRAPH_KEYWORDS = [
  'what is',
  'define',
  'explain',
  'concept',
  'theory',
  'relationship',
  'how does',
  'compare',
  'difference between',
];

const RECENCY_KEYWORDS = [
  'latest',
  'recent',
  'news',
  'update',
  'current',
  'today',
  'yesterday',
  'this week',
  'this month',
  'trending',
];

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some(keyword => text.includes(keyword));
}

function wordCount(query: string): number {
  return query.split(/\s+/).filter(Boolean).length;
}

/**
 * Keyword classification of a raw query. No external calls.
 */
export function analyzeQuery(query: string): QueryAnalysis {
  const queryLower = query.toLowerCase();
  const words = wordCount(query);

  let intent: QueryAnalysis['intent'] = 'information_request';
  if (containsAny(queryLower, DEFINITION_KEYWORDS)) {
    intent = 'definition';
  } else if (containsAny(queryLower, INSTRUCTION_KEYWORDS)) {
    intent = 'instructions';
  } else if (containsAny(queryLower, COMPARISON_KEYWORDS)) {
    intent = 'comparison';
  }

  let complexity: QueryAnalysis['complexity'] = 'medium';
  if (words > 10 || containsAny(queryLower, COMPLEXITY_KEYWORDS)) {
    complexity = 'high';
  } else if (words < 5) {
    complexity = 'low';
  }

  const needsCurrentInfo = containsAny(queryLower, CURRENT_INFO_KEYWORDS);

  return {
    intent,
    complexity,
    needsFacts: true,
    needsCurrentInfo,
    expectedSources: needsCurrentInfo ? ['graph', 'internet'] : ['graph'],
  };
}

export function needsGraphSearch(query: string): boolean {
  return containsAny(query.toLowerCase(), GRAPH_KEYWORDS);
}

export function needsInternetSearch(query: string, now: Date = new Date()): boolean {
  const queryLower = query.toLowerCase();
  if (containsAny(queryLower, RECENCY_KEYWORDS)) return true;

  const year = now.getFullYear();
  const yearPattern = new RegExp(`\\b(${year}|${year + 1})\\b`);
  return yearPattern.test(queryLower);
}

/**
 * Which retrievers the query itself asks for, within what the options allow.
 * The two checks are independent.
 */
export function routeQuery(query: string, options: RunOptions, now: Date = new Date()): RoutingDecision {
  return {
    searchGraph: options.useGraph && needsGraphSearch(query),
    searchInternet: options.useInternet && needsInternetSearch(query, now),
  };
}
