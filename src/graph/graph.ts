import { StateGraph, END, START } from '@langchain/langgraph';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { RunOptions } from '../types';
import { WorkflowDependencies } from './dependencies';
import { RunState, RunStateAnnotation, createInitialState } from './state';
import { MAX_ITERATIONS, WorkflowStep, WorkflowTarget, advance, entryStep } from './transitions';
import { createRouterNode } from './nodes/router';
import { analyzerNode } from './nodes/analyzer';
import { createGraphSearchNode } from './nodes/graph-search';
import { createInternetSearchNode } from './nodes/internet-search';
import { createGeneratorNode } from './nodes/generator';
import { formatterNode } from './nodes/formatter';

type NodeHandler = (state: RunState) => Promise<Partial<RunState>>;

const WORKFLOW_STEPS: WorkflowStep[] = ['route', 'analyze', 'search_graph', 'search_internet', 'generate', 'format'];

/**
 * Adds the bookkeeping every step shares: completed-step log, cycle count
 * and the next step chosen by the pure transition function.
 */
function withTransition(step: WorkflowStep, handler: NodeHandler, maxIterations: number): NodeHandler {
  return async (state: RunState) => {
    const update = await handler(state);
    const transition = advance(step, state, maxIterations);

    const reasoningTrace = [...(update.reasoningTrace ?? [])];
    if (transition.maxIterationsReached) {
      logger.warn('Iteration limit reached - forcing answer generation', {
        step,
        iterations: transition.iterations,
      });
      reasoningTrace.push(`Iteration limit of ${maxIterations} reached after ${step}; generating answer`);
    }

    return {
      ...update,
      reasoningTrace,
      completedSteps: [step],
      iterations: transition.iterations,
      nextStep: transition.nextStep,
      maxIterationsReached: state.maxIterationsReached || transition.maxIterationsReached,
    };
  };
}

function nextStepOf(state: RunState): WorkflowTarget {
  return state.nextStep ?? 'generate';
}

export function createWorkflowGraph(deps: WorkflowDependencies) {
  const maxIterations = deps.maxIterations ?? MAX_ITERATIONS;

  const workflow = new StateGraph(RunStateAnnotation)
    .addNode('route', withTransition('route', createRouterNode(deps), maxIterations))
    .addNode('analyze', withTransition('analyze', analyzerNode, maxIterations))
    .addNode('search_graph', withTransition('search_graph', createGraphSearchNode(deps), maxIterations))
    .addNode('search_internet', withTransition('search_internet', createInternetSearchNode(deps), maxIterations))
    .addNode('generate', withTransition('generate', createGeneratorNode(deps), maxIterations))
    .addNode('format', withTransition('format', formatterNode, maxIterations));

  workflow.addConditionalEdges(START, (state: RunState) => entryStep(state, maxIterations), {
    route: 'route',
    generate: 'generate',
  });

  const targets = {
    route: 'route',
    analyze: 'analyze',
    search_graph: 'search_graph',
    search_internet: 'search_internet',
    generate: 'generate',
    format: 'format',
    done: END,
  } as const;

  for (const step of WORKFLOW_STEPS) {
    workflow.addConditionalEdges(step, nextStepOf, targets);
  }

  return workflow.compile();
}

export type CompiledWorkflow = ReturnType<typeof createWorkflowGraph>;

export async function runWorkflow(
  graph: CompiledWorkflow,
  query: string,
  options: RunOptions,
  context: Record<string, unknown> = {}
): Promise<RunState> {
  const startTime = Date.now();
  const result = await graph.invoke(createInitialState(query, options, context), {
    recursionLimit: config.execution.recursionLimit,
  });

  logger.info('Workflow completed', {
    executionTime: Date.now() - startTime,
    iterations: result.iterations,
    steps: result.completedSteps,
    documents: result.documents.length,
    lastError: result.lastError,
  });

  return result;
}
