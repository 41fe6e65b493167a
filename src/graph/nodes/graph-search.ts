import { logger } from '../../core/logger';
import { getErrorMessage } from '../../core/errors';
import { WorkflowDependencies } from '../dependencies';
import { RunState } from '../state';

export function createGraphSearchNode(deps: WorkflowDependencies) {
  return async function graphSearchNode(state: RunState): Promise<Partial<RunState>> {
    if (!state.options.useGraph) {
      return { reasoningTrace: ['Graph search skipped (disabled)'] };
    }

    try {
      const results = await deps.graphRetriever.search(state.query, state.options.maxResults);
      return {
        documents: results,
        reasoningTrace: [`Found ${results.length} graph results`],
      };
    } catch (error) {
      const message = `Graph search error: ${getErrorMessage(error)}`;
      logger.error('Graph search node failed', { error: getErrorMessage(error) });
      return {
        lastError: message,
        reasoningTrace: [`${message} - continuing without graph results`],
      };
    }
  };
}
