import { logger } from '../../core/logger';
import { routeQuery } from '../../utils/query-analyzer';
import { previewText } from '../../utils/security';
import { WorkflowDependencies } from '../dependencies';
import { RunState } from '../state';

export function createRouterNode(deps: WorkflowDependencies) {
  return async function routerNode(state: RunState): Promise<Partial<RunState>> {
    const routing = routeQuery(state.query, state.options, deps.now?.() ?? new Date());

    const plannedSteps = ['analyze_query'];
    if (routing.searchGraph) plannedSteps.push('search_graph');
    if (routing.searchInternet) plannedSteps.push('search_internet');
    plannedSteps.push('generate_answer');

    logger.info('Routing query', { query: previewText(state.query), plannedSteps });

    return {
      routing,
      reasoningTrace: [`Query routed to steps: ${plannedSteps.join(', ')}`],
    };
  };
}
