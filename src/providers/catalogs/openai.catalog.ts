import { ProviderDescriptor } from '../../types/index.js';

export const OPENAI_PROVIDER: ProviderDescriptor = {
  id: 'openai',
  displayName: 'OpenAI',
  wireFormat: 'openai',
  baseUrl: 'https://api.openai.com/v1',
  defaultModel: 'gpt-4o',
  defaultContextLength: 8192,
  modelCatalog: {
    'gpt-5.1': { displayName: 'GPT-5.1', contextLength: 1048576, description: 'Most capable GPT model with 1M context.' },
    'gpt-5': { displayName: 'GPT-5', contextLength: 256000, description: 'Powerful general-purpose model.' },
    'gpt-5-mini': { displayName: 'GPT-5 Mini', contextLength: 256000, description: 'Cost-effective GPT-5 variant.' },
    'gpt-5-nano': { displayName: 'GPT-5 Nano', contextLength: 128000, description: 'Fastest GPT-5 variant for simple tasks.' },
    'gpt-4.1': { displayName: 'GPT-4.1', contextLength: 1048576, description: 'GPT-4.1 with 1M context window.' },
    'gpt-4o': { displayName: 'GPT-4o', contextLength: 128000, description: 'Multimodal model for complex tasks.' },
    'gpt-4o-mini': { displayName: 'GPT-4o Mini', contextLength: 128000, description: 'Fast and cost-effective for most tasks.' },
    'o3-mini': { displayName: 'o3-mini', contextLength: 200000, description: 'Small reasoning model.' },
    o1: { displayName: 'o1', contextLength: 200000, description: 'Reasoning model for complex problems.' },
  },
};
