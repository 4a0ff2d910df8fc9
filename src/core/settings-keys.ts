export const SETTING_KEYS = {
  provider: 'ai_provider',
  model: 'ai_model',
  temperature: 'ai_temperature',
  maxTokens: 'ai_max_tokens',
} as const;

export const DEFAULT_PROVIDER_ID = 'openai';

export function credentialKey(providerId: string): string {
  return `${providerId}_api_key`;
}
