import { logger } from '../core/logger';
import { getErrorMessage } from '../core/errors';
import { RESPONSE_TEMPLATES } from '../prompts/templates';
import { TextGenerator } from '../services/llm.service';
import { FormattedSource, SourceDocument, SynthesisResult } from '../types';
import { FirstJsonObjectParser, ResponseParser, rawTextAnswer } from './response-parser';

export function formatSources(documents: readonly SourceDocument[]): FormattedSource[] {
  return documents.map(document => ({
    title: document.title,
    reference: document.reference,
    type: document.kind,
    confidence: document.confidence,
  }));
}

export function meanConfidence(documents: readonly SourceDocument[]): number {
  if (documents.length === 0) return 0;
  return documents.reduce((sum, document) => sum + document.confidence, 0) / documents.length;
}

export class AnswerSynthesizer {
  constructor(
    private generator: TextGenerator | null,
    private parser: ResponseParser = new FirstJsonObjectParser()
  ) {}

  /**
   * Builds the final answer from every accumulated document. `sources`
   * always lists all documents, whichever branch produced the prose.
   */
  async synthesize(
    query: string,
    documents: readonly SourceDocument[],
    reasoning: readonly string[] = []
  ): Promise<SynthesisResult> {
    const sources = formatSources(documents);
    const base = { reasoning: [...reasoning], confidence: meanConfidence(documents) };

    if (documents.length === 0) {
      return {
        answer: RESPONSE_TEMPLATES.INSUFFICIENT_ANSWER,
        sources: [],
        structuredOutput: {
          key_points: [...RESPONSE_TEMPLATES.INSUFFICIENT_KEY_POINTS],
          summary: RESPONSE_TEMPLATES.INSUFFICIENT_SUMMARY,
          ...base,
        },
        mode: 'insufficient',
      };
    }

    if (this.generator && this.generator.isConfigured()) {
      try {
        const prompt = RESPONSE_TEMPLATES.ANSWER_PROMPT(query, RESPONSE_TEMPLATES.CONTEXT_BLOCK(documents));
        const raw = await this.generator.generate(prompt);
        const parsed = this.parser.parse(raw);
        const answer = parsed ?? rawTextAnswer(raw);

        logger.info('Answer generated', { parsed: parsed !== null, sources: sources.length });

        return {
          answer: answer.answer,
          sources,
          structuredOutput: { key_points: answer.key_points, summary: answer.summary, ...base },
          mode: parsed ? 'generated' : 'raw_text',
        };
      } catch (error) {
        logger.warn('Answer generation failed - using fallback answer', { error: getErrorMessage(error) });
      }
    }

    return this.fallbackAnswer(documents, sources, base);
  }

  private fallbackAnswer(
    documents: readonly SourceDocument[],
    sources: FormattedSource[],
    base: { reasoning: string[]; confidence: number }
  ): SynthesisResult {
    const graphCount = documents.filter(document => document.kind === 'graph').length;
    const internetCount = documents.filter(document => document.kind === 'internet').length;

    return {
      answer: RESPONSE_TEMPLATES.FALLBACK_ANSWER(documents.length, graphCount, internetCount),
      sources,
      structuredOutput: {
        key_points: RESPONSE_TEMPLATES.FALLBACK_KEY_POINTS(graphCount, internetCount),
        summary: RESPONSE_TEMPLATES.FALLBACK_SUMMARY(documents.length),
        ...base,
      },
      mode: 'fallback',
    };
  }
}
