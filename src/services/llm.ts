/**
 * LLM integration layer using the Vercel AI SDK (OpenAI provider).
 *
 * The API key lives on the service instance; nothing is read from or
 * written to process-wide configuration after construction.
 */

import { generateText } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { logger } from '../utils/logger.js';
import { LLMAuthError, LLMError } from '../types/errors.js';

export interface TextGenerationRequest {
  apiKey: string;
  model: string;
  system: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
}

/**
 * Sends one prompt to the provider and returns the completion text.
 */
export type TextGenerator = (request: TextGenerationRequest) => Promise<string>;

export const openAITextGenerator: TextGenerator = async (request) => {
  const openai = createOpenAI({ apiKey: request.apiKey });

  const result = await generateText({
    model: openai(request.model),
    system: request.system,
    prompt: request.prompt,
    temperature: request.temperature,
    maxOutputTokens: request.maxOutputTokens,
    maxRetries: 0,
  });

  if (result.usage) {
    logger.info(
      `LLM API call successful - ` +
        `Input: ${result.usage.inputTokens}, ` +
        `Output: ${result.usage.outputTokens}`
    );
  }

  return result.text;
};

export interface LLMServiceOptions {
  apiKey?: string;
  model?: string;
  generator?: TextGenerator;
  maxRetries?: number;
}

export interface CompletionOptions {
  temperature?: number;
  maxOutputTokens?: number;
}

export class LLMService {
  private apiKey: string | null;
  private readonly model: string;
  private readonly generator: TextGenerator;
  private readonly maxRetries: number;

  constructor(options: LLMServiceOptions = {}) {
    this.apiKey = options.apiKey ?? null;
    this.model = options.model ?? 'gpt-4';
    this.generator = options.generator ?? openAITextGenerator;
    this.maxRetries = options.maxRetries ?? 3;
  }

  /**
   * Whether a key is configured. Makes no remote call.
   */
  isAuthenticated(): boolean {
    return this.apiKey !== null;
  }

  /**
   * Check a key against the provider with a minimal completion.
   * Returns the provider's error message when the key is rejected.
   */
  private async check(apiKey: string): Promise<string | null> {
    try {
      await this.generator({
        apiKey,
        model: this.model,
        system: 'Reply with OK.',
        prompt: 'ping',
        temperature: 0,
        maxOutputTokens: 16,
      });
      return null;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`OpenAI authentication failed: ${message}`);
      return message;
    }
  }

  /**
   * Store the key only if the provider accepts it.
   */
  async setApiKey(apiKey: string): Promise<boolean> {
    const failure = await this.check(apiKey);
    if (failure !== null) {
      return false;
    }
    this.apiKey = apiKey;
    logger.info('OpenAI API key set');
    return true;
  }

  /**
   * Remote check of the configured key.
   */
  async verify(): Promise<{ valid: boolean; message: string }> {
    if (this.apiKey === null) {
      return {
        valid: false,
        message:
          'OpenAI API key not configured. Please set your API key first using the /openai/set-key endpoint.',
      };
    }

    const failure = await this.check(this.apiKey);
    if (failure !== null) {
      return { valid: false, message: `OpenAI authentication failed: ${failure}` };
    }
    return { valid: true, message: 'OpenAI API is properly configured and authenticated' };
  }

  /**
   * Call the LLM with exponential backoff between attempts.
   *
   * @throws LLMAuthError when no key is configured
   * @throws LLMError if all retries fail
   */
  async complete(
    prompt: string,
    system: string,
    options: CompletionOptions = {}
  ): Promise<string> {
    const apiKey = this.apiKey;
    if (apiKey === null) {
      throw new LLMAuthError(
        'OpenAI not configured. Please set your API key first using the /openai/set-key endpoint.'
      );
    }

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        return await this.generator({
          apiKey,
          model: this.model,
          system,
          prompt,
          temperature: options.temperature ?? 0.1,
          maxOutputTokens: options.maxOutputTokens ?? 500,
        });
      } catch (error) {
        const waitTime = Math.pow(2, attempt); // Exponential backoff
        logger.warn(
          `LLM API call failed (attempt ${attempt + 1}/${this.maxRetries}): ${error}`
        );

        if (attempt < this.maxRetries - 1) {
          logger.info(`Retrying in ${waitTime} seconds...`);
          await new Promise((resolve) => setTimeout(resolve, waitTime * 1000));
        } else {
          const message = error instanceof Error ? error.message : String(error);
          throw new LLMError(
            `LLM API failed after ${this.maxRetries} attempts: ${message}`
          );
        }
      }
    }

    throw new LLMError('Unexpected error in complete');
  }
}
