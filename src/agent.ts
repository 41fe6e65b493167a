import { z } from 'zod';
import { config } from './core/config';
import { logger } from './core/logger';
import { ValidationError, getErrorMessage } from './core/errors';
import { WorkflowDependencies } from './graph/dependencies';
import { CompiledWorkflow, createWorkflowGraph, runWorkflow } from './graph/graph';
import { RunState } from './graph/state';
import { AgentErrorResponse, AgentResponse, AgentSuccessResponse, RunOptions } from './types';
import { previewText } from './utils/security';

export const QueryOptionsSchema = z.object({
  use_graph: z.boolean().default(true),
  use_internet: z.boolean().default(true),
  max_results: z.number().int().min(1).max(20).default(config.defaults.maxResults),
});

const ContextSchema = z.record(z.unknown());

export function parseRunOptions(input: unknown): RunOptions {
  const result = QueryOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'options';
    throw new ValidationError(`Invalid option ${field}: ${issue?.message ?? 'invalid value'}`);
  }
  return {
    useGraph: result.data.use_graph,
    useInternet: result.data.use_internet,
    maxResults: result.data.max_results,
  };
}

function errorResponse(code: AgentErrorResponse['error']['code'], message: string): AgentErrorResponse {
  return { status: 'error', error: { code, message } };
}

/**
 * Public entry point of the engine. Builds the workflow once from explicit
 * dependencies and turns each query into a structured response.
 */
export class HybridRetrievalAgent {
  private graph: CompiledWorkflow;

  constructor(deps: WorkflowDependencies) {
    this.graph = createWorkflowGraph(deps);
  }

  /**
   * Runs the workflow and returns the full run state, for callers that need
   * the trace and step log rather than the response envelope.
   */
  async run(query: string, options: RunOptions, context: Record<string, unknown> = {}): Promise<RunState> {
    return runWorkflow(this.graph, query, options, context);
  }

  /**
   * Validation problems come back as INVALID_REQUEST before any retriever
   * runs; anything unexpected afterwards as PROCESSING_ERROR.
   */
  async processQuery(query: unknown, options?: unknown, context?: unknown): Promise<AgentResponse> {
    if (typeof query !== 'string' || query.trim().length === 0) {
      return errorResponse('INVALID_REQUEST', 'Query cannot be empty');
    }

    let runOptions: RunOptions;
    try {
      runOptions = parseRunOptions(options);
    } catch (error) {
      return errorResponse('INVALID_REQUEST', getErrorMessage(error));
    }

    const parsedContext = ContextSchema.optional().safeParse(context ?? undefined);
    if (!parsedContext.success) {
      return errorResponse('INVALID_REQUEST', 'Context must be an object');
    }

    const trimmed = query.trim();

    try {
      logger.info('Processing query', { query: previewText(trimmed, 50), options: runOptions });

      const state = await this.run(trimmed, runOptions, parsedContext.data ?? {});

      const response: AgentSuccessResponse = {
        status: 'success',
        response: {
          answer: state.finalAnswer ?? '',
          sources: state.sources,
          structured_output: state.structuredOutput ?? {
            key_points: [],
            summary: '',
            reasoning: state.reasoningTrace,
            confidence: 0,
          },
        },
      };

      if (parsedContext.data && Object.keys(parsedContext.data).length > 0) {
        response.context = parsedContext.data;
      }

      logger.info('Processed query successfully', { sources: state.sources.length });
      return response;
    } catch (error) {
      logger.error('Query processing failed', {
        error: getErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return errorResponse('PROCESSING_ERROR', 'Failed to process query');
    }
  }
}
