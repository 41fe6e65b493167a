import { RunOptions } from '../types';

export const MAX_ITERATIONS = 5;

export type WorkflowStep =
  | 'route'
  | 'analyze'
  | 'search_graph'
  | 'search_internet'
  | 'generate'
  | 'format';

export type WorkflowTarget = WorkflowStep | 'done';

// Steps that count as an orchestration cycle; generate and format are terminal
const CYCLE_STEPS: ReadonlySet<WorkflowStep> = new Set(['route', 'analyze', 'search_graph', 'search_internet']);

export function isCycleStep(step: WorkflowTarget): step is WorkflowStep {
  return step !== 'done' && CYCLE_STEPS.has(step);
}

export interface TransitionState {
  options: RunOptions;
  iterations: number;
}

export interface Transition {
  nextStep: WorkflowTarget;
  iterations: number;
  maxIterationsReached: boolean;
}

/**
 * The fixed step graph, before the iteration guard is applied.
 */
export function plannedNextStep(step: WorkflowStep, options: RunOptions): WorkflowTarget {
  switch (step) {
    case 'route':
      return 'analyze';
    case 'analyze':
      if (options.useGraph) return 'search_graph';
      return options.useInternet ? 'search_internet' : 'generate';
    case 'search_graph':
      return options.useInternet ? 'search_internet' : 'generate';
    case 'search_internet':
      return 'generate';
    case 'generate':
      return 'format';
    case 'format':
      return 'done';
  }
}

/**
 * Entry guard: a run that already used its cycle budget goes straight to
 * generation.
 */
export function entryStep(state: TransitionState, maxIterations: number = MAX_ITERATIONS): WorkflowStep {
  return state.iterations >= maxIterations ? 'generate' : 'route';
}

/**
 * Pure transition for a completed step: counts the cycle, then forces
 * `generate` whenever another cycle would exceed the budget.
 */
export function advance(
  step: WorkflowStep,
  state: TransitionState,
  maxIterations: number = MAX_ITERATIONS
): Transition {
  const iterations = isCycleStep(step) ? state.iterations + 1 : state.iterations;
  const planned = plannedNextStep(step, state.options);

  if (isCycleStep(planned) && iterations >= maxIterations) {
    return { nextStep: 'generate', iterations, maxIterationsReached: true };
  }

  return { nextStep: planned, iterations, maxIterationsReached: false };
}
