import type { LanguageModel } from 'ai';
import type { z } from 'zod';

import {
  NoObjectGeneratedError,
  Output,
  generateText,
  hasToolCall,
  tool,
} from 'ai';

import { detectProvider } from './provider-detector';

/**
 * Configuration for LLM API call with retry and fallback support
 */
export interface LLMCallConfig<TOutput> {
  /**
   * Zod schema for response validation
   */
  schema: z.ZodType<TOutput>;

  /**
   * System prompt for LLM
   */
  systemPrompt: string;

  /**
   * User prompt for LLM
   */
  userPrompt: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model tried once the primary model has exhausted maxRetries (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum retry count per model
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'UnitEvaluator')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'identification', 'evaluation')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface PromptParams {
  system: string;
  prompt: string;
  temperature?: number;
  maxRetries: number;
  abortSignal?: AbortSignal;
}

interface RawUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

interface GeneratedOutput<TOutput> {
  output: TOutput;
  usage?: RawUsage;
}

/**
 * LLMCaller - Centralized LLM API caller with retry and fallback support
 *
 * Wraps AI SDK's generateText with structured output:
 * 1. Try primary model (AI SDK retries transport errors up to maxRetries)
 * 2. If it fails and a fallbackModel is provided, try the fallback
 * 3. Return usage data with model type indicator
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   schema: z.object({ units: z.string() }),
 *   systemPrompt: 'Identify key resume sections.',
 *   userPrompt: '## document\n\n...',
 *   primaryModel: ollama('llama3.2:3b'),
 *   fallbackModel: openai('gpt-4o-mini'),
 *   maxRetries: 3,
 *   component: 'UnitIdentifier',
 *   phase: 'identification',
 * });
 * ```
 */
export class LLMCaller {
  /**
   * Maximum number of retries when structured output generation fails.
   * Total attempts = MAX_STRUCTURED_OUTPUT_RETRIES + 1.
   */
  private static readonly MAX_STRUCTURED_OUTPUT_RETRIES = 3;

  private static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  private static buildUsage(
    config: { component: string; phase: string },
    modelName: string,
    usage: RawUsage | undefined,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
      totalTokens: usage?.totalTokens ?? 0,
    };
  }

  /**
   * Generate structured output via forced tool call.
   *
   * Used for providers that do not reliably honour a JSON response format.
   * Forces the model to call a tool whose input schema is the target schema.
   *
   * @throws NoObjectGeneratedError when no attempt produces a tool call
   */
  private static async generateViaToolCall<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput>,
    params: PromptParams,
  ): Promise<GeneratedOutput<TOutput>> {
    const submitTool = tool({
      description: 'Submit the structured result',
      inputSchema: schema,
    });

    const generate = () =>
      generateText({
        ...params,
        model,
        tools: { submitResult: submitTool },
        toolChoice: { type: 'tool', toolName: 'submitResult' },
        stopWhen: hasToolCall('submitResult'),
      });

    let result = await generate();
    for (
      let attempt = 1;
      attempt <= this.MAX_STRUCTURED_OUTPUT_RETRIES &&
      result.toolCalls.length === 0;
      attempt++
    ) {
      result = await generate();
    }

    const toolCall = result.toolCalls[0];
    if (!toolCall) {
      throw new NoObjectGeneratedError({
        message: 'Model did not produce a tool call for structured output',
        text: result.text,
        response: result.response,
        usage: result.usage,
        finishReason: result.finishReason,
      });
    }

    return { output: schema.parse(toolCall.input), usage: result.usage };
  }

  /**
   * Generate structured output with provider-aware strategy.
   *
   * - OpenAI / Anthropic / Google: structured output with schema retry
   * - Together AI / Ollama / unknown: forced tool call
   */
  private static async generateStructuredOutput<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput>,
    params: PromptParams,
  ): Promise<GeneratedOutput<TOutput>> {
    const providerType = detectProvider(model);

    if (
      providerType === 'togetherai' ||
      providerType === 'ollama' ||
      providerType === 'unknown'
    ) {
      return this.generateViaToolCall(model, schema, params);
    }

    let lastError: unknown;

    for (
      let attempt = 0;
      attempt <= this.MAX_STRUCTURED_OUTPUT_RETRIES;
      attempt++
    ) {
      try {
        const result = await generateText({
          ...params,
          model,
          experimental_output: Output.object({ schema }),
        });
        return {
          output: schema.parse(result.experimental_output),
          usage: result.usage,
        };
      } catch (error) {
        if (NoObjectGeneratedError.isInstance(error)) {
          lastError = error;
          continue;
        }
        throw error;
      }
    }

    throw lastError;
  }

  /**
   * Call LLM with retry and fallback support
   *
   * @throws Error from the last attempted model when every attempt fails
   */
  static async call<TOutput>(
    config: LLMCallConfig<TOutput>,
  ): Promise<LLMCallResult<TOutput>> {
    const params: PromptParams = {
      system: config.systemPrompt,
      prompt: config.userPrompt,
      temperature: config.temperature,
      maxRetries: config.maxRetries,
      abortSignal: config.abortSignal,
    };

    try {
      const response = await this.generateStructuredOutput(
        config.primaryModel,
        config.schema,
        params,
      );

      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          this.extractModelName(config.primaryModel),
          response.usage,
          false,
        ),
        usedFallback: false,
      };
    } catch (primaryError) {
      // Aborted calls never fall through to the fallback model
      if (config.abortSignal?.aborted || !config.fallbackModel) {
        throw primaryError;
      }

      const response = await this.generateStructuredOutput(
        config.fallbackModel,
        config.schema,
        params,
      );

      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          this.extractModelName(config.fallbackModel),
          response.usage,
          true,
        ),
        usedFallback: true,
      };
    }
  }
}
