import crypto from 'crypto';
import { LoggerAuditSink } from '../audit/logger-audit-sink.js';
import { CommerceAssistant, PendingTurn } from '../core/commerce-assistant.js';
import { ConfirmationStore } from '../core/confirmation-store.js';
import { ToolInvocationLoop } from '../core/tool-invocation-loop.js';
import { UsageLedger } from '../core/usage-ledger.js';
import { LLMProviderFactory } from '../factories/llm-provider.factory.js';
import { ILogger } from '../interfaces/logger.interface.js';
import { ISettingsStore } from '../interfaces/settings_store.interface.js';
import { registerStoreTools } from '../tools/store-tools.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { CredentialCipher } from '../utils/credential-cipher.js';
import { AppEnv } from '../utils/validation.js';
import { AssistantApiServer } from './server.js';

export interface AssistantAppOptions {
  readonly env: AppEnv;
  readonly settings: ISettingsStore;
  readonly secret: string | Buffer;
  readonly logger: ILogger;
  readonly host?: string;
}

export interface AssistantApp {
  readonly server: AssistantApiServer;
  readonly assistant: CommerceAssistant;
  readonly factory: LLMProviderFactory;
  readonly registry: ToolRegistry;
  readonly ledger: UsageLedger;
  readonly apiToken: string;
}

/** Wires the assistant's object graph; owns the cache and ledger lifetimes. */
export async function createAssistantApp(options: AssistantAppOptions): Promise<AssistantApp> {
  const { env, settings, logger } = options;

  const ledger = new UsageLedger({ store: settings, logger: logger.child('usage') });
  await ledger.load();

  const factory = new LLMProviderFactory({
    store: settings,
    cipher: new CredentialCipher(options.secret),
    ledger,
    logger,
    baseUrls: {
      openai: env.OPENAI_BASE_URL,
      anthropic: env.ANTHROPIC_BASE_URL,
      google: env.GOOGLE_BASE_URL,
      xai: env.XAI_BASE_URL,
      deepseek: env.DEEPSEEK_BASE_URL,
    },
  });

  const registry = new ToolRegistry(new LoggerAuditSink(logger.child('audit')));
  registerStoreTools(registry, settings);

  const assistant = new CommerceAssistant({
    factory,
    loop: new ToolInvocationLoop(registry, logger, env.MAX_TOOL_ITERATIONS),
    settings,
    confirmations: new ConfirmationStore<PendingTurn>(),
    logger,
  });

  const apiToken = env.API_TOKEN ?? crypto.randomBytes(24).toString('hex');
  if (!env.API_TOKEN) {
    logger.info(`No API_TOKEN set; generated one for this session: ${apiToken}`);
  }

  const server = new AssistantApiServer(
    { assistant, factory, registry, ledger, settings, logger, apiToken },
    env.API_PORT,
    options.host
  );

  return { server, assistant, factory, registry, ledger, apiToken };
}
