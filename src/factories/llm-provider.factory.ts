import crypto from 'crypto';
import { InvalidProviderError, ProviderError } from '../errors/index.js';
import { ILLMProvider } from '../interfaces/llm_provider.interface.js';
import { ILogger } from '../interfaces/logger.interface.js';
import { ISettingsStore } from '../interfaces/settings_store.interface.js';
import { AnthropicProvider } from '../providers/anthropic.provider.js';
import { BUILT_IN_PROVIDERS } from '../providers/catalogs/index.js';
import { GoogleProvider } from '../providers/google.provider.js';
import { OpenAICompatibleProvider } from '../providers/openai.provider.js';
import { ProviderDeps } from '../providers/provider.shared.js';
import { UsageLedger } from '../core/usage-ledger.js';
import { DEFAULT_PROVIDER_ID, SETTING_KEYS, credentialKey } from '../core/settings-keys.js';
import { ProviderConfig, ProviderDescriptor, Result } from '../types/index.js';
import { CredentialCipher } from '../utils/credential-cipher.js';
import { err, ok } from '../utils/result.js';

export type ProviderFactoryFn = (credential: string, deps: ProviderDeps) => ILLMProvider;

export interface LLMProviderFactoryOptions {
  readonly store: ISettingsStore;
  readonly cipher: CredentialCipher;
  readonly ledger: UsageLedger;
  readonly logger: ILogger;
  /** Per-provider base URL overrides, keyed by provider id. */
  readonly baseUrls?: Readonly<Record<string, string | undefined>>;
}

export interface ProviderSummary {
  readonly id: string;
  readonly name: string;
  readonly configured: boolean;
  readonly defaultModel: string;
}

/** One adapter per wire family; vendors differ only in their descriptor. */
export function createAdapter(config: ProviderConfig, deps: ProviderDeps): ILLMProvider {
  switch (config.wireFormat) {
    case 'openai':
      return new OpenAICompatibleProvider(config, deps);
    case 'anthropic':
      return new AnthropicProvider(config, deps);
    case 'google':
      return new GoogleProvider(config, deps);
  }
}

function fingerprint(credential: string): string {
  return crypto.createHash('sha256').update(credential).digest('hex');
}

export class LLMProviderFactory {
  private readonly factories = new Map<string, ProviderFactoryFn>();
  private readonly cache = new Map<string, ILLMProvider>();
  private readonly deps: ProviderDeps;
  private readonly logger: ILogger;

  constructor(private readonly options: LLMProviderFactoryOptions) {
    this.logger = options.logger.child('providers');
    this.deps = { ledger: options.ledger, logger: options.logger };

    for (const descriptor of BUILT_IN_PROVIDERS) {
      this.registerProvider(descriptor.id, (credential, deps) => createAdapter(this.configFor(descriptor, credential), deps));
    }
  }

  /** First registration wins; returns false when the id is taken. */
  registerProvider(id: string, factoryFn: ProviderFactoryFn): boolean {
    if (this.factories.has(id)) {
      this.logger.warn('Provider already registered', { provider: id });
      return false;
    }
    this.factories.set(id, factoryFn);
    return true;
  }

  has(providerId: string): boolean {
    return this.factories.has(providerId);
  }

  create(providerId: string, credential: string): Result<ILLMProvider, InvalidProviderError> {
    const factoryFn = this.factories.get(providerId);
    if (!factoryFn) {
      return err(new InvalidProviderError(providerId));
    }

    const cacheKey = `${providerId}:${fingerprint(credential)}`;
    let provider = this.cache.get(cacheKey);
    if (!provider) {
      provider = factoryFn(credential, this.deps);
      this.cache.set(cacheKey, provider);
    }
    return ok(provider);
  }

  async getConfiguredProvider(): Promise<Result<ILLMProvider, InvalidProviderError>> {
    const providerId = await this.options.store.get(SETTING_KEYS.provider, DEFAULT_PROVIDER_ID);
    const credential = await this.getCredential(providerId);
    return this.create(providerId, credential);
  }

  async saveCredential(providerId: string, credential: string): Promise<Result<true, InvalidProviderError>> {
    if (!this.has(providerId)) {
      return err(new InvalidProviderError(providerId));
    }
    await this.options.store.set(credentialKey(providerId), this.options.cipher.encrypt(credential));
    this.logger.info('Credential saved', { provider: providerId });
    return ok(true);
  }

  /** Empty string when nothing is stored or the stored value cannot be decrypted. */
  async getCredential(providerId: string): Promise<string> {
    const stored = await this.options.store.get(credentialKey(providerId), '');
    try {
      return this.options.cipher.decrypt(stored);
    } catch (error) {
      this.logger.warn('Stored credential could not be decrypted', {
        provider: providerId,
        reason: error instanceof Error ? error.message : String(error),
      });
      return '';
    }
  }

  async availableProviders(): Promise<ProviderSummary[]> {
    const summaries: ProviderSummary[] = [];
    for (const providerId of this.factories.keys()) {
      const created = this.create(providerId, await this.getCredential(providerId));
      if (created.ok) {
        const provider = created.value;
        summaries.push({
          id: providerId,
          name: provider.name,
          configured: provider.isConfigured(),
          defaultModel: provider.getModel(),
        });
      }
    }
    return summaries;
  }

  async validateCredential(
    providerId: string,
    credential: string
  ): Promise<Result<true, InvalidProviderError | ProviderError>> {
    const created = this.create(providerId, credential);
    if (!created.ok) {
      return created;
    }
    return created.value.validateCredential();
  }

  private configFor(descriptor: ProviderDescriptor, credential: string): ProviderConfig {
    return {
      ...descriptor,
      baseUrl: this.options.baseUrls?.[descriptor.id] ?? descriptor.baseUrl,
      credential,
    };
  }
}
