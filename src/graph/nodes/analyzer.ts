import { logger } from '../../core/logger';
import { analyzeQuery } from '../../utils/query-analyzer';
import { RunState } from '../state';

export async function analyzerNode(state: RunState): Promise<Partial<RunState>> {
  const analysis = analyzeQuery(state.query);

  logger.debug('Query analyzed', { ...analysis });

  return {
    analysis,
    reasoningTrace: [
      `Query analysis: intent=${analysis.intent}, complexity=${analysis.complexity}, ` +
        `current info=${analysis.needsCurrentInfo}, expected sources=${analysis.expectedSources.join('/')}`,
    ],
  };
}
