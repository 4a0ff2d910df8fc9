import { ProviderDescriptor } from '../../types/index.js';

export const ANTHROPIC_PROVIDER: ProviderDescriptor = {
  id: 'anthropic',
  displayName: 'Anthropic',
  wireFormat: 'anthropic',
  // The SDK appends /v1/messages itself.
  baseUrl: 'https://api.anthropic.com',
  defaultModel: 'claude-3-5-sonnet-20241022',
  defaultContextLength: 200000,
  modelCatalog: {
    'claude-sonnet-4-20250514': { displayName: 'Claude Sonnet 4', contextLength: 200000, description: 'Sonnet model for complex tasks.' },
    'claude-opus-4-20250514': { displayName: 'Claude Opus 4', contextLength: 200000, description: 'Most powerful Claude 4 model.' },
    'claude-3-7-sonnet-20250219': { displayName: 'Claude 3.7 Sonnet', contextLength: 200000, description: 'Hybrid reasoning model.' },
    'claude-3-5-sonnet-20241022': { displayName: 'Claude 3.5 Sonnet', contextLength: 200000, description: 'Fast and intelligent, good for most tasks.' },
    'claude-3-5-haiku-20241022': { displayName: 'Claude 3.5 Haiku', contextLength: 200000, description: 'Fastest model, cost-effective option.' },
    'claude-3-haiku-20240307': { displayName: 'Claude 3 Haiku', contextLength: 200000, description: 'Fast and compact Claude 3 model.' },
  },
};
