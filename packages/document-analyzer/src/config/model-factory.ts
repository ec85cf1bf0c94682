import type { LanguageModel } from 'ai';

import type { ProviderApiKeys } from './analyzer-config';

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { createTogetherAI } from '@ai-sdk/togetherai';

import { ConfigError } from './config-error';

export interface ModelFactoryOptions {
  /**
   * OpenAI-compatible endpoint of a local Ollama server
   */
  ollamaBaseUrl: string;
  apiKeys?: ProviderApiKeys;
}

/**
 * Converts model id strings to LanguageModel instances.
 *
 * Providers are created on first use and cached per factory.
 *
 * Model ID format: "provider/model-name"
 * Examples:
 *   - "ollama/llama3.2:3b"
 *   - "openai/gpt-4o-mini"
 *   - "anthropic/claude-3-5-haiku-latest"
 *   - "together/meta-llama/Llama-3.3-70B-Instruct-Turbo"
 */
export class ModelFactory {
  private openaiProvider: ReturnType<typeof createOpenAI> | null = null;
  private anthropicProvider: ReturnType<typeof createAnthropic> | null = null;
  private googleProvider: ReturnType<typeof createGoogleGenerativeAI> | null =
    null;
  private togetherProvider: ReturnType<typeof createTogetherAI> | null = null;
  private ollamaProvider: ReturnType<typeof createOpenAICompatible> | null =
    null;

  constructor(private readonly options: ModelFactoryOptions) {}

  /**
   * @throws {ConfigError} When the id is malformed or names an unknown provider
   */
  create(modelId: string): LanguageModel {
    const [provider, ...rest] = modelId.split('/');
    const modelName = rest.join('/');

    if (!modelName) {
      throw new ConfigError(
        `Invalid model id "${modelId}", expected "provider/model"`,
      );
    }

    switch (provider) {
      case 'openai':
        return this.getOpenAI()(modelName);
      case 'anthropic':
        return this.getAnthropic()(modelName);
      case 'google':
        return this.getGoogle()(modelName);
      case 'together':
        return this.getTogether()(modelName);
      case 'ollama':
        return this.getOllama()(modelName);
      default:
        throw new ConfigError(`Unknown provider: ${provider}`);
    }
  }

  private getOpenAI() {
    if (!this.openaiProvider) {
      this.openaiProvider = createOpenAI({
        apiKey: this.options.apiKeys?.openai,
      });
    }
    return this.openaiProvider;
  }

  private getAnthropic() {
    if (!this.anthropicProvider) {
      this.anthropicProvider = createAnthropic({
        apiKey: this.options.apiKeys?.anthropic,
      });
    }
    return this.anthropicProvider;
  }

  private getGoogle() {
    if (!this.googleProvider) {
      this.googleProvider = createGoogleGenerativeAI({
        apiKey: this.options.apiKeys?.google,
      });
    }
    return this.googleProvider;
  }

  private getTogether() {
    if (!this.togetherProvider) {
      this.togetherProvider = createTogetherAI({
        apiKey: this.options.apiKeys?.together,
      });
    }
    return this.togetherProvider;
  }

  private getOllama() {
    if (!this.ollamaProvider) {
      this.ollamaProvider = createOpenAICompatible({
        name: 'ollama',
        baseURL: this.options.ollamaBaseUrl,
      });
    }
    return this.ollamaProvider;
  }
}
