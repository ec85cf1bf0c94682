import type { LanguageModel } from 'ai';

import type {
  OracleInputs,
  OracleRequest,
  OracleResponse,
  TextOracle,
} from './text-oracle';

import { LLMCaller } from '@docsense/shared';

import { OracleUnavailableError } from './oracle-error';

export interface LanguageModelOracleOptions {
  /**
   * Primary language model
   */
  model: LanguageModel;

  /**
   * Model tried after the primary model fails (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum retry count per model (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for generation (default: 0)
   */
  temperature?: number;
}

/**
 * TextOracle backed by an AI SDK language model.
 *
 * The instruction becomes the system prompt and each named input a
 * markdown section of the user prompt; outputs come back as structured
 * fields validated against the request schema.
 */
export class LanguageModelOracle implements TextOracle {
  private readonly model: LanguageModel;
  private readonly fallbackModel?: LanguageModel;
  private readonly maxRetries: number;
  private readonly temperature: number;

  constructor(options: LanguageModelOracleOptions) {
    this.model = options.model;
    this.fallbackModel = options.fallbackModel;
    this.maxRetries = options.maxRetries ?? 3;
    this.temperature = options.temperature ?? 0;
  }

  /**
   * @throws {OracleUnavailableError} When neither model produced an answer
   */
  async call<TOutput>(
    request: OracleRequest<TOutput>,
  ): Promise<OracleResponse<TOutput>> {
    try {
      const result = await LLMCaller.call({
        schema: request.schema,
        systemPrompt: this.buildSystemPrompt(request.instruction),
        userPrompt: this.buildUserPrompt(request.inputs),
        primaryModel: this.model,
        fallbackModel: this.fallbackModel,
        maxRetries: this.maxRetries,
        temperature: this.temperature,
        abortSignal: request.abortSignal,
        component: request.component,
        phase: request.phase,
      });

      return { output: result.output, usage: result.usage };
    } catch (error) {
      if (request.abortSignal?.aborted) {
        throw error;
      }
      throw OracleUnavailableError.fromError(
        `${request.component} ${request.phase} call failed`,
        error,
      );
    }
  }

  protected buildSystemPrompt(instruction: string): string {
    return `${instruction}

Fill in every requested output field with plain text. Never omit a field; use an empty string when there is nothing to report.`;
  }

  protected buildUserPrompt(inputs: OracleInputs): string {
    return Object.entries(inputs)
      .map(([name, value]) => `## ${name}\n\n${value}`)
      .join('\n\n');
  }
}
