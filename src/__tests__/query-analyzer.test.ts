import { analyzeQuery, needsGraphSearch, needsInternetSearch, routeQuery } from '../utils/query-analyzer';
import { DEFAULT_RUN_OPTIONS } from '../types';

describe('analyzeQuery', () => {
  test('classifies a short definitional query', () => {
    expect(analyzeQuery('What is AI?')).toEqual({
      intent: 'definition',
      complexity: 'low',
      needsFacts: true,
      needsCurrentInfo: false,
      expectedSources: ['graph'],
    });
  });

  test('detects instructions and high complexity from word count', () => {
    const analysis = analyzeQuery('How to train a model step by step with limited labelled data and compute');

    expect(analysis.intent).toBe('instructions');
    expect(analysis.complexity).toBe('high');
  });

  test('detects comparisons', () => {
    const analysis = analyzeQuery('Compare postgres vs mysql for services');

    expect(analysis.intent).toBe('comparison');
    expect(analysis.complexity).toBe('medium');
  });

  test('definition keywords take precedence over comparison keywords', () => {
    expect(analyzeQuery('Explain the difference between them').intent).toBe('definition');
  });

  test('complexity keywords force high complexity on short queries', () => {
    expect(analyzeQuery('detailed overview').complexity).toBe('high');
  });

  test('recency keywords add the internet as an expected source', () => {
    const analysis = analyzeQuery('latest news on quantum computing');

    expect(analysis.intent).toBe('information_request');
    expect(analysis.complexity).toBe('medium');
    expect(analysis.needsCurrentInfo).toBe(true);
    expect(analysis.expectedSources).toEqual(['graph', 'internet']);
  });
});

describe('routing', () => {
  const now = new Date('2026-03-01T00:00:00Z');

  test('graph search is scheduled for definitional queries only', () => {
    expect(needsGraphSearch('What is AI?')).toBe(true);
    expect(needsGraphSearch('How does attention work')).toBe(true);
    expect(needsGraphSearch('weather in Paris')).toBe(false);
  });

  test('internet search is scheduled for recency keywords', () => {
    expect(needsInternetSearch('trending repositories', now)).toBe(true);
    expect(needsInternetSearch('what happened this week', now)).toBe(true);
    expect(needsInternetSearch('history of computing', now)).toBe(false);
  });

  test('year tokens count only for the current and next year', () => {
    expect(needsInternetSearch('AI trends in 2026', now)).toBe(true);
    expect(needsInternetSearch('AI trends in 2027', now)).toBe(true);
    expect(needsInternetSearch('AI trends in 2030', now)).toBe(false);
    expect(needsInternetSearch('order 20261 shipped', now)).toBe(false);
  });

  test('both checks are independent and bounded by options', () => {
    expect(routeQuery('What is AI?', DEFAULT_RUN_OPTIONS, now)).toEqual({
      searchGraph: true,
      searchInternet: false,
    });
    expect(routeQuery('Explain the latest transformer research', DEFAULT_RUN_OPTIONS, now)).toEqual({
      searchGraph: true,
      searchInternet: true,
    });
    expect(
      routeQuery('Explain the latest transformer research', { ...DEFAULT_RUN_OPTIONS, useGraph: false }, now)
    ).toEqual({ searchGraph: false, searchInternet: true });
    expect(routeQuery('weather in Paris', DEFAULT_RUN_OPTIONS, now)).toEqual({
      searchGraph: false,
      searchInternet: false,
    });
  });
});
