import type { LanguageModel } from 'ai';

export type ProviderType =
  | 'openai'
  | 'google'
  | 'anthropic'
  | 'togetherai'
  | 'ollama'
  | 'unknown';

/**
 * Detect the provider type from a LanguageModel.
 *
 * Model objects are matched on their `provider` field (e.g. 'openai.chat');
 * plain string ids on their 'provider/model' prefix. Falls back to 'unknown'.
 */
export function detectProvider(model: LanguageModel): ProviderType {
  const providerId =
    typeof model === 'string' ? model.split('/')[0] : model.provider;
  if (!providerId) return 'unknown';

  if (providerId.includes('openai')) return 'openai';
  if (providerId.includes('google')) return 'google';
  if (providerId.includes('anthropic')) return 'anthropic';
  if (providerId.includes('together')) return 'togetherai';
  if (providerId.includes('ollama')) return 'ollama';

  return 'unknown';
}
