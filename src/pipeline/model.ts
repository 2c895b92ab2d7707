import OpenAI from 'openai';
import { ModelError } from '../core/errors.js';
import { logger } from '../core/logger.js';

/** Prompt in, text out. */
export interface LanguageModel {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}

export interface ModelSettings {
  token: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  topP: number;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 120000;

/**
 * Chat-completions client for any OpenAI-compatible endpoint: a local Ollama or
 * llama.cpp server by default, or a hosted router that takes the access token.
 */
export class OpenAICompatibleModel implements LanguageModel {
  private client: OpenAI;

  constructor(private settings: ModelSettings) {
    if (!settings.token) {
      throw new ModelError('A model access token is required', 'config_missing_token');
    }
    this.client = new OpenAI({
      apiKey: settings.token,
      baseURL: settings.baseUrl,
      timeout: settings.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 1,
    });
  }

  get name(): string {
    return this.settings.model;
  }

  async generate(prompt: string): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.settings.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
        top_p: this.settings.topP,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new ModelError('No content in response', 'empty_response');
      }
      return content.trim();
    } catch (error) {
      if (error instanceof ModelError) {
        throw error;
      }
      if (error instanceof OpenAI.APIConnectionTimeoutError) {
        throw new ModelError('Request timed out', 'timeout');
      }
      if (error instanceof OpenAI.APIError) {
        logger.error(`Model API error ${error.status ?? ''}: ${error.message}`);
        throw new ModelError(`Model API error: ${error.status ?? 'unknown'}`, `api_error_${error.status ?? 'unknown'}`);
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new ModelError(`Request failed: ${message}`, 'request_failed');
    }
  }
}
