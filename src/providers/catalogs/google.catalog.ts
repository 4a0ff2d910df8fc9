import { ProviderDescriptor } from '../../types/index.js';

export const GOOGLE_PROVIDER: ProviderDescriptor = {
  id: 'google',
  displayName: 'Google Gemini',
  wireFormat: 'google',
  baseUrl: 'https://generativelanguage.googleapis.com/v1beta',
  defaultModel: 'gemini-2.5-flash',
  defaultContextLength: 1048576,
  modelCatalog: {
    'gemini-2.5-pro': { displayName: 'Gemini 2.5 Pro', contextLength: 1048576, description: 'Pro model with enhanced reasoning.' },
    'gemini-2.5-flash': { displayName: 'Gemini 2.5 Flash', contextLength: 1048576, description: 'Fast model with adaptive thinking.' },
    'gemini-2.5-flash-lite': { displayName: 'Gemini 2.5 Flash-Lite', contextLength: 1048576, description: 'Cost-efficient for high-volume tasks.' },
    'gemini-2.0-flash': { displayName: 'Gemini 2.0 Flash', contextLength: 1048576, description: 'Fast model with 1M context.' },
    'gemini-1.5-pro': { displayName: 'Gemini 1.5 Pro', contextLength: 2097152, description: 'Largest context window, 2M tokens.' },
    'gemini-1.5-flash': { displayName: 'Gemini 1.5 Flash', contextLength: 1048576, description: 'Fast and efficient with 1M context.' },
  },
};
