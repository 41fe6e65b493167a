import { RESPONSE_TEMPLATES } from '../../prompts/templates';
import { RunState } from '../state';

export async function formatterNode(state: RunState): Promise<Partial<RunState>> {
  const finalNote = `Formatted final answer with ${state.sources.length} sources`;
  const structuredOutput = state.structuredOutput ?? {
    key_points: [...RESPONSE_TEMPLATES.INSUFFICIENT_KEY_POINTS],
    summary: RESPONSE_TEMPLATES.INSUFFICIENT_SUMMARY,
    reasoning: [],
    confidence: 0,
  };

  return {
    finalAnswer: state.finalAnswer ?? RESPONSE_TEMPLATES.INSUFFICIENT_ANSWER,
    structuredOutput: {
      ...structuredOutput,
      reasoning: [...state.reasoningTrace, finalNote],
    },
    reasoningTrace: [finalNote],
    shouldContinue: false,
  };
}
