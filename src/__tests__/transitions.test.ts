import {
  MAX_ITERATIONS,
  WorkflowTarget,
  advance,
  entryStep,
  isCycleStep,
  plannedNextStep,
} from '../graph/transitions';
import { RunOptions } from '../types';

const both: RunOptions = { useGraph: true, useInternet: true, maxResults: 5 };
const graphOnly: RunOptions = { useGraph: true, useInternet: false, maxResults: 5 };
const internetOnly: RunOptions = { useGraph: false, useInternet: true, maxResults: 5 };
const neither: RunOptions = { useGraph: false, useInternet: false, maxResults: 5 };

function drive(options: RunOptions, startIterations: number) {
  const visited: WorkflowTarget[] = [];
  let iterations = startIterations;
  let step: WorkflowTarget = entryStep({ options, iterations });

  while (step !== 'done') {
    visited.push(step);
    const transition = advance(step, { options, iterations });
    iterations = transition.iterations;
    step = transition.nextStep;
  }

  return { visited, iterations };
}

describe('plannedNextStep', () => {
  test('follows the fixed step graph with skips', () => {
    expect(plannedNextStep('route', both)).toBe('analyze');
    expect(plannedNextStep('analyze', both)).toBe('search_graph');
    expect(plannedNextStep('analyze', internetOnly)).toBe('search_internet');
    expect(plannedNextStep('analyze', neither)).toBe('generate');
    expect(plannedNextStep('search_graph', both)).toBe('search_internet');
    expect(plannedNextStep('search_graph', graphOnly)).toBe('generate');
    expect(plannedNextStep('search_internet', both)).toBe('generate');
    expect(plannedNextStep('generate', both)).toBe('format');
    expect(plannedNextStep('format', both)).toBe('done');
  });
});

describe('advance', () => {
  test('counts cycle steps only', () => {
    expect(advance('route', { options: both, iterations: 0 })).toEqual({
      nextStep: 'analyze',
      iterations: 1,
      maxIterationsReached: false,
    });
    expect(advance('generate', { options: both, iterations: 4 })).toEqual({
      nextStep: 'format',
      iterations: 4,
      maxIterationsReached: false,
    });
  });

  test('forces generate when the next cycle would exceed the budget', () => {
    expect(advance('analyze', { options: both, iterations: 4 })).toEqual({
      nextStep: 'generate',
      iterations: 5,
      maxIterationsReached: true,
    });
  });

  test('does not flag the limit when the planned step is already terminal', () => {
    expect(advance('search_internet', { options: both, iterations: 4 })).toEqual({
      nextStep: 'generate',
      iterations: 5,
      maxIterationsReached: false,
    });
  });

  test('honours a custom budget', () => {
    expect(advance('route', { options: both, iterations: 0 }, 1).nextStep).toBe('generate');
  });
});

describe('entryStep', () => {
  test('skips straight to generate once the budget is spent', () => {
    expect(entryStep({ options: both, iterations: 0 })).toBe('route');
    expect(entryStep({ options: both, iterations: MAX_ITERATIONS })).toBe('generate');
  });
});

describe('loop bound', () => {
  test('every option combination terminates within the iteration budget', () => {
    for (const options of [both, graphOnly, internetOnly, neither]) {
      for (let start = 0; start <= MAX_ITERATIONS; start++) {
        const { visited, iterations } = drive(options, start);

        expect(iterations).toBeLessThanOrEqual(MAX_ITERATIONS);
        expect(visited.slice(-2)).toEqual(['generate', 'format']);
        expect(visited.filter(isCycleStep).length).toBeLessThanOrEqual(MAX_ITERATIONS);
      }
    }
  });

  test('a fresh run with both sources visits every step once', () => {
    expect(drive(both, 0)).toEqual({
      visited: ['route', 'analyze', 'search_graph', 'search_internet', 'generate', 'format'],
      iterations: 4,
    });
  });
});
