import { ProviderDescriptor } from '../../types/index.js';

export const XAI_PROVIDER: ProviderDescriptor = {
  id: 'xai',
  displayName: 'xAI (Grok)',
  wireFormat: 'openai',
  baseUrl: 'https://api.x.ai/v1',
  defaultModel: 'grok-4-fast-non-reasoning',
  defaultContextLength: 131072,
  modelCatalog: {
    'grok-4-0709': { displayName: 'Grok 4', contextLength: 256000, description: 'Most advanced Grok model.' },
    'grok-4-fast-reasoning': { displayName: 'Grok 4 Fast (Reasoning)', contextLength: 2000000, description: 'Fast Grok 4 with reasoning.' },
    'grok-4-fast-non-reasoning': { displayName: 'Grok 4 Fast', contextLength: 2000000, description: 'Fastest Grok 4 variant.' },
    'grok-code-fast-1': { displayName: 'Grok Code Fast', contextLength: 256000, description: 'Tuned for code generation.' },
    'grok-3': { displayName: 'Grok 3', contextLength: 131072, description: 'Capable Grok 3 model.' },
    'grok-3-mini': { displayName: 'Grok 3 Mini', contextLength: 131072, description: 'Cost-effective Grok 3 variant.' },
  },
};
