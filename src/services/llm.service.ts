import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { GenerationError, getErrorMessage } from '../core/errors';
import { withTimeout } from '../utils/timeout';
import { RateLimiter } from '../utils/rate-limiter';

/**
 * Prose generation from already-retrieved facts. The synthesizer treats it
 * as a black box and has a deterministic path for when it is absent.
 */
export interface TextGenerator {
  isConfigured(): boolean;
  generate(prompt: string): Promise<string>;
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface LLMSettings {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export class LLMService implements TextGenerator {
  private client: AxiosInstance;
  private rateLimiter: RateLimiter;

  constructor(
    private settings: LLMSettings = {
      apiKey: config.openrouter.apiKey,
      baseUrl: config.openrouter.baseUrl,
      model: config.models.generator,
      timeoutMs: config.execution.externalTimeout,
    }
  ) {
    this.client = axios.create({
      baseURL: settings.baseUrl,
      headers: {
        'Authorization': `Bearer ${settings.apiKey}`,
        'X-Title': 'Hybrid Retrieval Orchestrator',
        'Content-Type': 'application/json',
      },
      timeout: settings.timeoutMs,
    });

    this.rateLimiter = new RateLimiter(50);
  }

  isConfigured(): boolean {
    return Boolean(this.settings.apiKey);
  }

  async generate(prompt: string): Promise<string> {
    return this.chat([{ role: 'user', content: prompt }], {
      temperature: 0.1,
      maxTokens: 1024,
    });
  }

  async chat(messages: LLMMessage[], options: LLMOptions = {}): Promise<string> {
    if (!this.isConfigured()) {
      throw new GenerationError('Text generation is not configured');
    }

    const model = this.settings.model;

    return this.rateLimiter.execute(async () => {
      try {
        logger.debug('LLM Request', { model, messageCount: messages.length });

        const response = await withTimeout(
          this.client.post('/chat/completions', {
            model,
            messages,
            temperature: options.temperature ?? 0.1,
            max_tokens: options.maxTokens ?? 1024,
          }),
          this.settings.timeoutMs,
          `LLM request timeout for ${model}`
        );

        const parsed = ChatCompletionSchema.parse(response.data);
        const content = parsed.choices[0]?.message?.content || '';

        logger.debug('LLM Response', {
          model,
          contentLength: content.length,
          tokens: parsed.usage?.total_tokens,
        });

        return content;
      } catch (error) {
        const responseData = axios.isAxiosError(error) ? error.response?.data : undefined;
        logger.error('LLM Error', {
          error: getErrorMessage(error),
          response: responseData,
        });

        throw new GenerationError(`LLM request failed: ${getErrorMessage(error)}`, {
          originalError: responseData ?? getErrorMessage(error),
        });
      }
    });
  }
}
