export * from './types/index.js';
export * from './errors/index.js';
export { ok, err } from './utils/result.js';
export { Logger } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
export { CredentialCipher } from './utils/credential-cipher.js';

export type { ILLMProvider, ProviderResult } from './interfaces/llm_provider.interface.js';
export type { ILogger, LogMeta } from './interfaces/logger.interface.js';
export type { ISettingsStore } from './interfaces/settings_store.interface.js';
export type { IAuditSink, AuditEventKind } from './interfaces/audit_sink.interface.js';

export { OpenAICompatibleProvider } from './providers/openai.provider.js';
export { AnthropicProvider } from './providers/anthropic.provider.js';
export { GoogleProvider } from './providers/google.provider.js';
export * from './providers/catalogs/index.js';
export type { ProviderDeps } from './providers/provider.shared.js';

export { LLMProviderFactory, createAdapter } from './factories/llm-provider.factory.js';
export type { ProviderFactoryFn, ProviderSummary } from './factories/llm-provider.factory.js';

export { ToolRegistry, checkArguments } from './tools/tool-registry.js';
export type { ToolRegistration } from './tools/tool-registry.js';
export { registerStoreTools } from './tools/store-tools.js';
export { LoggerAuditSink, MemoryAuditSink } from './audit/logger-audit-sink.js';

export { UsageLedger } from './core/usage-ledger.js';
export { ToolInvocationLoop, DEFAULT_MAX_ITERATIONS } from './core/tool-invocation-loop.js';
export type {
  ToolLoopOptions,
  ToolLoopOutcome,
  ToolLoopResult,
  ToolLoopConfirmationRequired,
} from './core/tool-invocation-loop.js';
export { ConfirmationStore } from './core/confirmation-store.js';
export { CommerceAssistant } from './core/commerce-assistant.js';
export type { AssistantReply, AssistantChatOptions } from './core/commerce-assistant.js';
export { ConfigManager, InMemorySettingsStore } from './api/config-manager.js';
export { AssistantApiServer } from './api/server.js';
export { createAssistantApp } from './api/app.js';
