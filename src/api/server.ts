import crypto from 'crypto';
import http from 'http';
import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { CommerceAssistant } from '../core/commerce-assistant.js';
import { SETTING_KEYS, DEFAULT_PROVIDER_ID } from '../core/settings-keys.js';
import { UsageLedger } from '../core/usage-ledger.js';
import { LLMProviderFactory } from '../factories/llm-provider.factory.js';
import { ILogger } from '../interfaces/logger.interface.js';
import { ISettingsStore } from '../interfaces/settings_store.interface.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import {
  ChatRequestSchema,
  CredentialRequestSchema,
  ProviderSelectionSchema,
  ValidateCredentialRequestSchema,
  describeIssue,
} from '../utils/validation.js';

export interface AssistantApiServerDeps {
  readonly assistant: CommerceAssistant;
  readonly factory: LLMProviderFactory;
  readonly registry: ToolRegistry;
  readonly ledger: UsageLedger;
  readonly settings: ISettingsStore;
  readonly logger: ILogger;
  readonly apiToken: string;
}

function digest(value: string): Buffer {
  return crypto.createHash('sha256').update(value).digest();
}

export class AssistantApiServer {
  readonly app: express.Application;
  private server?: http.Server;
  private readonly logger: ILogger;
  private readonly tokenDigest: Buffer;

  constructor(
    private readonly deps: AssistantApiServerDeps,
    private readonly port: number = 3001,
    private readonly host: string = 'localhost'
  ) {
    this.app = express();
    this.logger = deps.logger.child('api');
    this.tokenDigest = digest(deps.apiToken);
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(cors({
      origin: true,
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Origin', 'X-Requested-With', 'Accept'],
      optionsSuccessStatus: 200,
    }));

    this.app.use(express.json({ limit: '1mb' }));

    this.app.use('/api', (req, res, next) => {
      const authHeader = req.headers.authorization;
      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        return res.status(401).json({ error: 'Missing or invalid authorization header' });
      }

      const token = authHeader.substring(7);
      if (!crypto.timingSafeEqual(digest(token), this.tokenDigest)) {
        return res.status(401).json({ error: 'Invalid API token' });
      }

      next();
    });
  }

  private setupRoutes(): void {
    const { assistant, factory, registry, ledger, settings } = this.deps;

    this.app.get('/health', (req, res) => {
      res.json({ status: 'ok' });
    });

    this.app.post('/api/chat', async (req, res) => {
      const parsed = ChatRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        const issue = describeIssue(parsed.error);
        return res.status(400).json({ error: issue.message, field: issue.field });
      }

      try {
        const { messages, authorizeDestructive, systemPrompt } = parsed.data;
        const reply = await assistant.chat(messages, { authorizeDestructive, systemPrompt });
        res.json(reply);
      } catch (error) {
        this.internalError(res, 'Chat request failed', error);
      }
    });

    this.app.post('/api/confirmations/:token', async (req, res) => {
      try {
        const reply = await assistant.confirm(req.params.token);
        const expired = reply.status === 'failed' && reply.code === 'confirmation_expired';
        res.status(expired ? 410 : 200).json(reply);
      } catch (error) {
        this.internalError(res, 'Confirmation failed', error);
      }
    });

    this.app.delete('/api/confirmations/:token', (req, res) => {
      if (!assistant.cancel(req.params.token)) {
        return res.status(404).json({ error: 'Confirmation not found' });
      }
      res.status(204).end();
    });

    this.app.get('/api/providers', async (req, res) => {
      try {
        const providers = await factory.availableProviders();
        const selected = await settings.get(SETTING_KEYS.provider, DEFAULT_PROVIDER_ID);
        res.json({ providers, selected });
      } catch (error) {
        this.internalError(res, 'Failed to list providers', error);
      }
    });

    this.app.put('/api/providers/:id/credential', async (req, res) => {
      const parsed = CredentialRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        const issue = describeIssue(parsed.error);
        return res.status(400).json({ error: issue.message, field: issue.field });
      }

      try {
        const saved = await factory.saveCredential(req.params.id, parsed.data.apiKey);
        if (!saved.ok) {
          return res.status(404).json({ error: saved.error.message });
        }
        res.json({ success: true });
      } catch (error) {
        this.internalError(res, 'Failed to save credential', error);
      }
    });

    this.app.post('/api/providers/:id/validate', async (req, res) => {
      const parsed = ValidateCredentialRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        const issue = describeIssue(parsed.error);
        return res.status(400).json({ error: issue.message, field: issue.field });
      }

      const providerId = req.params.id;
      if (!factory.has(providerId)) {
        return res.status(404).json({ error: `Invalid AI provider: ${providerId}` });
      }

      try {
        const credential = parsed.data.apiKey ?? (await factory.getCredential(providerId));
        const result = await factory.validateCredential(providerId, credential);
        if (result.ok) {
          return res.json({ valid: true });
        }
        res.json({ valid: false, error: result.error.message, code: result.error.code });
      } catch (error) {
        this.internalError(res, 'Credential validation failed', error);
      }
    });

    this.app.put('/api/settings/provider', async (req, res) => {
      const parsed = ProviderSelectionSchema.safeParse(req.body);
      if (!parsed.success) {
        const issue = describeIssue(parsed.error);
        return res.status(400).json({ error: issue.message, field: issue.field });
      }

      const { providerId, model, temperature, maxTokens } = parsed.data;
      if (!factory.has(providerId)) {
        return res.status(404).json({ error: `Invalid AI provider: ${providerId}` });
      }

      try {
        await settings.set(SETTING_KEYS.provider, providerId);
        await settings.set(SETTING_KEYS.model, model ?? '');
        if (temperature !== undefined) {
          await settings.set(SETTING_KEYS.temperature, String(temperature));
        }
        if (maxTokens !== undefined) {
          await settings.set(SETTING_KEYS.maxTokens, String(maxTokens));
        }
        this.logger.info('Provider selection updated', { provider: providerId, model: model ?? null });
        res.json({ success: true });
      } catch (error) {
        this.internalError(res, 'Failed to update provider selection', error);
      }
    });

    this.app.get('/api/tools', (req, res) => {
      const tools = registry.catalog().map(tool => ({
        ...tool,
        destructive: registry.isDestructive(tool.name),
      }));
      res.json({ tools });
    });

    this.app.get('/api/usage', (req, res) => {
      res.json({ today: ledger.today(), usage: ledger.snapshot() });
    });

    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        return next(error);
      }
      if (error instanceof SyntaxError) {
        return res.status(400).json({ error: 'Request body is not valid JSON' });
      }
      this.internalError(res, 'Unhandled request error', error);
    });
  }

  private internalError(res: Response, message: string, error: unknown): void {
    this.logger.error(message, error);
    res.status(500).json({ error: 'Internal server error' });
  }

  /** Resolves with the bound port, which differs from the requested one when that is 0. */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : this.port;
        this.logger.info(`Assistant API running on http://${this.host}:${port}`);
        resolve(port);
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }
}
