import { ProviderDescriptor } from '../../types/index.js';
import { ANTHROPIC_PROVIDER } from './anthropic.catalog.js';
import { DEEPSEEK_PROVIDER } from './deepseek.catalog.js';
import { GOOGLE_PROVIDER } from './google.catalog.js';
import { OPENAI_PROVIDER } from './openai.catalog.js';
import { XAI_PROVIDER } from './xai.catalog.js';

export { ANTHROPIC_PROVIDER, DEEPSEEK_PROVIDER, GOOGLE_PROVIDER, OPENAI_PROVIDER, XAI_PROVIDER };

export const BUILT_IN_PROVIDERS: readonly ProviderDescriptor[] = [
  OPENAI_PROVIDER,
  ANTHROPIC_PROVIDER,
  GOOGLE_PROVIDER,
  XAI_PROVIDER,
  DEEPSEEK_PROVIDER,
];
