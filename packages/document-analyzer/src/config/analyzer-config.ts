import { z } from 'zod';

import { ConfigError } from './config-error';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  DOCSENSE_MODEL: z.string().trim().min(1).default('ollama/llama3.2:3b'),
  DOCSENSE_FALLBACK_MODEL: optionalString,
  DOCSENSE_OLLAMA_BASE_URL: z
    .string()
    .url()
    .default('http://localhost:11434/v1'),
  DOCSENSE_CALL_TIMEOUT_MS: z.coerce.number().int().min(0).default(30000),
  DOCSENSE_UNIT_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  DOCSENSE_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  DOCSENSE_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
  DOCSENSE_LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error'])
    .default('info'),
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  GOOGLE_GENERATIVE_AI_API_KEY: optionalString,
  TOGETHER_AI_API_KEY: optionalString,
});

/**
 * Provider credentials; a missing key leaves the provider to its own
 * environment lookup
 */
export interface ProviderApiKeys {
  openai?: string;
  anthropic?: string;
  google?: string;
  together?: string;
}

export interface AnalyzerConfig {
  /**
   * Primary model id, "provider/model"
   */
  model: string;
  fallbackModel?: string;
  ollamaBaseUrl: string;
  callTimeoutMs: number;
  unitConcurrency: number;
  maxRetries: number;
  temperature: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  apiKeys: ProviderApiKeys;
}

/**
 * Read analyzer settings from environment variables.
 *
 * Empty values count as unset.
 *
 * @throws {ConfigError} When a variable is present but invalid
 */
export function loadAnalyzerConfig(
  env: Record<string, string | undefined> = process.env,
): AnalyzerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value !== '',
    ),
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigError(
      'Invalid analyzer configuration',
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }

  const values = parsed.data;
  return {
    model: values.DOCSENSE_MODEL,
    fallbackModel: values.DOCSENSE_FALLBACK_MODEL,
    ollamaBaseUrl: values.DOCSENSE_OLLAMA_BASE_URL,
    callTimeoutMs: values.DOCSENSE_CALL_TIMEOUT_MS,
    unitConcurrency: values.DOCSENSE_UNIT_CONCURRENCY,
    maxRetries: values.DOCSENSE_MAX_RETRIES,
    temperature: values.DOCSENSE_TEMPERATURE,
    logLevel: values.DOCSENSE_LOG_LEVEL,
    apiKeys: {
      openai: values.OPENAI_API_KEY,
      anthropic: values.ANTHROPIC_API_KEY,
      google: values.GOOGLE_GENERATIVE_AI_API_KEY,
      together: values.TOGETHER_AI_API_KEY,
    },
  };
}
