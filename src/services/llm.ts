/**
 * LLM integration layer using the Vercel AI SDK.
 *
 * The pipeline only sees the `GenerationCapability` interface: one call in,
 * raw text plus usage out. Retries, validation and budgeting live with the
 * callers, so each `generate` is a single provider request.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { apiKeyFor } from '../config.js';
import type { ModelConfig } from '../config.js';
import { LLMError, ResponseFormatError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Raw result of one model call.
 */
export interface GenerationResponse {
  text: string;
  finishReason: string;
  inputTokens: number;
  outputTokens: number;
  elapsedMs: number;
}

/**
 * `generate(prompt, config) -> raw_response | fails`. Used for both
 * mapping generation and semantic judgment.
 */
export interface GenerationCapability {
  readonly modelName: string;
  generate(prompt: string, system: string | null): Promise<GenerationResponse>;
}

/**
 * Reject responses that finished for a reason other than a normal stop.
 *
 * @throws ResponseFormatError with kind `empty_output`, `max_token` or `recitation`
 */
export function usableText(response: GenerationResponse): string {
  if (response.finishReason === 'length') {
    throw new ResponseFormatError('max_token', 'Response stopped at the output token limit');
  }
  if (response.finishReason === 'content-filter') {
    throw new ResponseFormatError('recitation', 'Response was blocked by the content filter');
  }
  if (response.text.trim().length === 0) {
    throw new ResponseFormatError('empty_output', 'Response text is empty');
  }
  return response.text;
}

/**
 * Service for calling a configured provider model.
 */
export class LLMService implements GenerationCapability {
  private modelPromise: Promise<LanguageModel> | null = null;
  private readonly config: ModelConfig;

  constructor(config: ModelConfig) {
    this.config = config;
  }

  get modelName(): string {
    return this.config.model_name;
  }

  /**
   * Lazy initialization of the provider model.
   */
  private initializeModel(): Promise<LanguageModel> {
    if (!this.modelPromise) {
      this.modelPromise = this.loadModel();
    }
    return this.modelPromise;
  }

  private async loadModel(): Promise<LanguageModel> {
    const apiKey = apiKeyFor(this.config.provider);
    logger.info(`Initializing LLM: ${this.config.provider}/${this.config.model_name}`);

    switch (this.config.provider) {
      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        return createAnthropic({ apiKey })(this.config.model_name);
      }

      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        return createOpenAI({ apiKey })(this.config.model_name);
      }

      case 'google': {
        const { createGoogleGenerativeAI } = await import('@ai-sdk/google');
        return createGoogleGenerativeAI({ apiKey })(this.config.model_name);
      }

      default: {
        throw new LLMError(`Unsupported provider: ${String(this.config.provider)}`);
      }
    }
  }

  /**
   * Send one prompt. When the model config disables system instructions the
   * system text is prepended to the prompt instead.
   *
   * @throws LLMError if the provider call fails
   */
  async generate(prompt: string, system: string | null): Promise<GenerationResponse> {
    const model = await this.initializeModel();
    const useSystem = this.config.use_system_instruction && Boolean(system);
    const started = Date.now();

    try {
      const result = await generateText({
        model,
        system: useSystem && system ? system : undefined,
        prompt: !useSystem && system ? `${system}\n\n${prompt}` : prompt,
        temperature: this.config.temperature,
        topP: this.config.top_p,
        topK: this.config.top_k,
        maxOutputTokens: this.config.max_output_tokens,
        // Callers own retries
        maxRetries: 0,
      });

      const response: GenerationResponse = {
        text: result.text,
        finishReason: result.finishReason,
        inputTokens: result.usage.inputTokens ?? 0,
        outputTokens: result.usage.outputTokens ?? 0,
        elapsedMs: Date.now() - started,
      };

      logger.debug(
        `LLM API call finished (${response.finishReason}) - ` +
          `Input: ${response.inputTokens}, ` +
          `Output: ${response.outputTokens}`
      );

      return response;
    } catch (error) {
      throw new LLMError(`LLM API call failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
