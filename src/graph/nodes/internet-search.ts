import { logger } from '../../core/logger';
import { getErrorMessage } from '../../core/errors';
import { SourceDocument } from '../../types';
import { WorkflowDependencies } from '../dependencies';
import { RunState } from '../state';

/**
 * Live web results first, then cached documents semantically close to the
 * query at half the result budget. A failure in one does not stop the other.
 */
export function createInternetSearchNode(deps: WorkflowDependencies) {
  return async function internetSearchNode(state: RunState): Promise<Partial<RunState>> {
    if (!state.options.useInternet) {
      return { reasoningTrace: ['Internet search skipped (disabled)'] };
    }

    const errors: string[] = [];
    let internetResults: SourceDocument[] = [];
    let semanticResults: SourceDocument[] = [];

    try {
      internetResults = await deps.webRetriever.search(state.query, state.options.maxResults);
    } catch (error) {
      errors.push(`Internet search error: ${getErrorMessage(error)}`);
      logger.error('Internet search node failed', { error: getErrorMessage(error) });
    }

    try {
      semanticResults = await deps.similarityCache.query(state.query, Math.floor(state.options.maxResults / 2));
    } catch (error) {
      errors.push(`Semantic search error: ${getErrorMessage(error)}`);
      logger.error('Semantic lookup failed', { error: getErrorMessage(error) });
    }

    const update: Partial<RunState> = {
      documents: [...internetResults, ...semanticResults],
      reasoningTrace: [
        `Found ${internetResults.length} internet results and ${semanticResults.length} semantic results`,
        ...errors,
      ],
    };

    if (errors.length > 0) {
      update.lastError = errors[errors.length - 1];
    }

    return update;
  };
}
