import type { ExtendedTokenUsage } from '@docsense/shared';
import type { z } from 'zod';

/**
 * Named string inputs of one oracle call, e.g. `{ unit, document }`
 */
export type OracleInputs = Readonly<Record<string, string>>;

/**
 * One typed oracle call: a natural-language instruction, named inputs and
 * the schema of the named outputs.
 */
export interface OracleRequest<TOutput> {
  instruction: string;
  inputs: OracleInputs;

  /**
   * Declares every output field; the oracle must return all of them
   */
  schema: z.ZodType<TOutput>;

  /**
   * Component name for tracking (e.g., 'UnitEvaluator')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'evaluation')
   */
  phase: string;

  abortSignal?: AbortSignal;
}

export interface OracleResponse<TOutput> {
  output: TOutput;

  /**
   * Absent for oracles that do not meter tokens
   */
  usage?: ExtendedTokenUsage;
}

/**
 * Text-generation oracle boundary.
 *
 * Implementations reject when the oracle cannot answer; content quality is
 * never guaranteed.
 */
export interface TextOracle {
  call<TOutput>(request: OracleRequest<TOutput>): Promise<OracleResponse<TOutput>>;
}
