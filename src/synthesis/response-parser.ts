import { z } from 'zod';
import { logger } from '../core/logger';
import { getErrorMessage } from '../core/errors';
import { RESPONSE_TEMPLATES } from '../prompts/templates';

const RAW_SUMMARY_LENGTH = 100;

export const ParsedAnswerSchema = z.object({
  answer: z.string(),
  key_points: z.array(z.string()),
  summary: z.string(),
});

export type ParsedAnswer = z.infer<typeof ParsedAnswerSchema>;

/**
 * Turns raw generated text into a structured answer, or `null` when the
 * text does not contain one.
 */
export interface ResponseParser {
  parse(raw: string): ParsedAnswer | null;
}

/**
 * Takes the span from the first `{` to the last `}` and parses it as JSON.
 */
export class FirstJsonObjectParser implements ResponseParser {
  parse(raw: string): ParsedAnswer | null {
    const match = raw.match(/\{[\s\S]*\}/);
    if (!match) return null;

    let candidate: unknown;
    try {
      candidate = JSON.parse(match[0]);
    } catch (error) {
      logger.debug('Generated text is not valid JSON', { error: getErrorMessage(error) });
      return null;
    }

    const result = ParsedAnswerSchema.safeParse(candidate);
    return result.success ? result.data : null;
  }
}

export function rawTextAnswer(raw: string): ParsedAnswer {
  // counted in code points so a surrogate pair is never cut in half
  const chars = Array.from(raw);
  return {
    answer: raw,
    key_points: [RESPONSE_TEMPLATES.RAW_TEXT_KEY_POINT],
    summary: chars.length > RAW_SUMMARY_LENGTH ? `${chars.slice(0, RAW_SUMMARY_LENGTH).join('')}...` : raw,
  };
}
