import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { createTogetherAI } from '@ai-sdk/togetherai';
import { describe, expect, test, vi } from 'vitest';

import { ConfigError } from './config-error';
import { ModelFactory } from './model-factory';

vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: vi.fn(() => (modelId: string) => ({
    provider: 'openai.responses',
    modelId,
  })),
}));
vi.mock('@ai-sdk/anthropic', () => ({
  createAnthropic: vi.fn(() => (modelId: string) => ({
    provider: 'anthropic.messages',
    modelId,
  })),
}));
vi.mock('@ai-sdk/google', () => ({
  createGoogleGenerativeAI: vi.fn(() => (modelId: string) => ({
    provider: 'google.generative-ai',
    modelId,
  })),
}));
vi.mock('@ai-sdk/togetherai', () => ({
  createTogetherAI: vi.fn(() => (modelId: string) => ({
    provider: 'togetherai.chat',
    modelId,
  })),
}));
vi.mock('@ai-sdk/openai-compatible', () => ({
  createOpenAICompatible: vi.fn(() => (modelId: string) => ({
    provider: 'ollama.chat',
    modelId,
  })),
}));

describe('ModelFactory', () => {
  const options = { ollamaBaseUrl: 'http://localhost:11434/v1' };

  test.each([
    ['openai/gpt-4o-mini', 'openai.responses', 'gpt-4o-mini'],
    [
      'anthropic/claude-3-5-haiku-latest',
      'anthropic.messages',
      'claude-3-5-haiku-latest',
    ],
    ['google/gemini-2.0-flash', 'google.generative-ai', 'gemini-2.0-flash'],
    [
      'together/meta-llama/Llama-3.3-70B-Instruct-Turbo',
      'togetherai.chat',
      'meta-llama/Llama-3.3-70B-Instruct-Turbo',
    ],
    ['ollama/llama3.2:3b', 'ollama.chat', 'llama3.2:3b'],
  ])('creates %s', (modelId, provider, modelName) => {
    const model = new ModelFactory(options).create(modelId);

    expect(model).toEqual({ provider, modelId: modelName });
  });

  test('points the ollama provider at the configured endpoint', () => {
    new ModelFactory({ ollamaBaseUrl: 'http://gpu-box:11434/v1' }).create(
      'ollama/qwen2.5:7b',
    );

    expect(createOpenAICompatible).toHaveBeenCalledWith({
      name: 'ollama',
      baseURL: 'http://gpu-box:11434/v1',
    });
  });

  test('passes configured api keys to providers', () => {
    const factory = new ModelFactory({
      ...options,
      apiKeys: { openai: 'test-secret', together: 'test-secret-2' },
    });

    factory.create('openai/gpt-4o-mini');
    factory.create('together/mistralai/Mixtral-8x7B-Instruct-v0.1');
    factory.create('anthropic/claude-3-5-haiku-latest');
    factory.create('google/gemini-2.0-flash');

    expect(createOpenAI).toHaveBeenCalledWith({ apiKey: 'test-secret' });
    expect(createTogetherAI).toHaveBeenCalledWith({ apiKey: 'test-secret-2' });
    expect(createAnthropic).toHaveBeenCalledWith({ apiKey: undefined });
    expect(createGoogleGenerativeAI).toHaveBeenCalledWith({
      apiKey: undefined,
    });
  });

  test('creates each provider once per factory', () => {
    const factory = new ModelFactory(options);

    factory.create('openai/gpt-4o-mini');
    factory.create('openai/gpt-4o');

    expect(createOpenAI).toHaveBeenCalledTimes(1);
  });

  test('keeps factories independent', () => {
    new ModelFactory(options).create('openai/gpt-4o-mini');
    new ModelFactory(options).create('openai/gpt-4o-mini');

    expect(createOpenAI).toHaveBeenCalledTimes(2);
  });

  test('rejects an unknown provider', () => {
    expect(() => new ModelFactory(options).create('mistral/large')).toThrow(
      new ConfigError('Unknown provider: mistral'),
    );
  });

  test('rejects an id without a model name', () => {
    expect(() => new ModelFactory(options).create('gpt-4o')).toThrow(
      ConfigError,
    );
  });
});
