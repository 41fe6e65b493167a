import { Annotation } from '@langchain/langgraph';
import {
  FormattedSource,
  QueryAnalysis,
  RoutingDecision,
  RunOptions,
  SourceDocument,
  StructuredOutput,
  SynthesisResult,
} from '../types';
import { WorkflowStep, WorkflowTarget } from './transitions';

function append<T>(left: T[], right: T[]): T[] {
  return left.concat(right);
}

/**
 * Per-query run state. List channels are append-only; every other channel
 * keeps the last value written.
 */
export const RunStateAnnotation = Annotation.Root({
  query: Annotation<string>,
  options: Annotation<RunOptions>,
  context: Annotation<Record<string, unknown>>,

  completedSteps: Annotation<WorkflowStep[]>({ reducer: append, default: () => [] }),
  documents: Annotation<SourceDocument[]>({ reducer: append, default: () => [] }),
  reasoningTrace: Annotation<string[]>({ reducer: append, default: () => [] }),

  analysis: Annotation<QueryAnalysis | null>,
  routing: Annotation<RoutingDecision | null>,

  iterations: Annotation<number>,
  nextStep: Annotation<WorkflowTarget | null>,
  lastError: Annotation<string | null>,
  maxIterationsReached: Annotation<boolean>,

  finalAnswer: Annotation<string | null>,
  sources: Annotation<FormattedSource[]>,
  structuredOutput: Annotation<StructuredOutput | null>,
  synthesisMode: Annotation<SynthesisResult['mode'] | null>,
  shouldContinue: Annotation<boolean>,
});

export type RunState = typeof RunStateAnnotation.State;

export function createInitialState(
  query: string,
  options: RunOptions,
  context: Record<string, unknown> = {}
): RunState {
  return {
    query,
    options: { ...options },
    context,
    completedSteps: [],
    documents: [],
    reasoningTrace: [],
    analysis: null,
    routing: null,
    iterations: 0,
    nextStep: 'route',
    lastError: null,
    maxIterationsReached: false,
    finalAnswer: null,
    sources: [],
    structuredOutput: null,
    synthesisMode: null,
    shouldContinue: true,
  };
}
