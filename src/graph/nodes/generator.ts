import { logger } from '../../core/logger';
import { WorkflowDependencies } from '../dependencies';
import { RunState } from '../state';

export function createGeneratorNode(deps: WorkflowDependencies) {
  return async function generatorNode(state: RunState): Promise<Partial<RunState>> {
    const result = await deps.synthesizer.synthesize(state.query, state.documents, state.reasoningTrace);

    logger.info('Answer synthesized', {
      mode: result.mode,
      documents: state.documents.length,
      iterations: state.iterations,
    });

    return {
      finalAnswer: result.answer,
      sources: result.sources,
      structuredOutput: result.structuredOutput,
      synthesisMode: result.mode,
      reasoningTrace: [`Answer synthesized in ${result.mode} mode from ${state.documents.length} documents`],
    };
  };
}
