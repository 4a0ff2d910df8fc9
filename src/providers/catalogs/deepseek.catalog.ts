import { ProviderDescriptor } from '../../types/index.js';

export const DEEPSEEK_PROVIDER: ProviderDescriptor = {
  id: 'deepseek',
  displayName: 'DeepSeek',
  wireFormat: 'openai',
  baseUrl: 'https://api.deepseek.com/v1',
  defaultModel: 'deepseek-chat',
  defaultContextLength: 64000,
  modelCatalog: {
    'deepseek-chat': { displayName: 'DeepSeek-V3', contextLength: 64000, description: 'General-purpose chat model.' },
    'deepseek-reasoner': { displayName: 'DeepSeek-R1', contextLength: 64000, description: 'Reasoning model.' },
  },
};
