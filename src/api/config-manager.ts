import crypto from 'crypto';
import fs from 'fs/promises';
import fsSync from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ILogger } from '../interfaces/logger.interface.js';
import { ISettingsStore } from '../interfaces/settings_store.interface.js';

const SettingsFileSchema = z.record(z.string());

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function defaultConfigDir(): string {
  return path.join(os.homedir(), '.storefront-copilot');
}

/**
 * File-backed settings store. Values live in `<configDir>/settings.json`, written
 * owner-only; the process-wide secret lives beside it in `.key`.
 */
export class ConfigManager implements ISettingsStore {
  private readonly settingsPath: string;
  private loading?: Promise<Record<string, string>>;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly configDir: string,
    private readonly logger: ILogger
  ) {
    this.settingsPath = path.join(configDir, 'settings.json');
  }

  getOrCreateSecret(): Buffer {
    const keyPath = path.join(this.configDir, '.key');
    try {
      return fsSync.readFileSync(keyPath);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
      const key = crypto.randomBytes(32);
      fsSync.mkdirSync(this.configDir, { recursive: true });
      fsSync.writeFileSync(keyPath, key, { mode: 0o600 });
      this.logger.info('Generated new credential secret', { path: keyPath });
      return key;
    }
  }

  async get(key: string, defaultValue = ''): Promise<string> {
    const settings = await this.load();
    return settings[key] ?? defaultValue;
  }

  async set(key: string, value: string): Promise<void> {
    const settings = await this.load();
    settings[key] = value;
    const snapshot = JSON.stringify(settings, null, 2);

    // A failed write has already been reported to whoever awaited it.
    this.writeChain = this.writeChain
      .catch(() => undefined)
      .then(() => this.persist(snapshot));
    await this.writeChain;
  }

  private load(): Promise<Record<string, string>> {
    if (!this.loading) {
      this.loading = this.readSettings().catch(error => {
        this.loading = undefined;
        throw error;
      });
    }
    return this.loading;
  }

  private async readSettings(): Promise<Record<string, string>> {
    try {
      const data = await fs.readFile(this.settingsPath, 'utf8');
      return SettingsFileSchema.parse(JSON.parse(data));
    } catch (error) {
      if (isNotFound(error)) {
        return {};
      }
      this.logger.error('Failed to load settings', error);
      throw error;
    }
  }

  private async persist(snapshot: string): Promise<void> {
    try {
      await fs.mkdir(this.configDir, { recursive: true });
      await fs.writeFile(this.settingsPath, snapshot, { mode: 0o600 });
    } catch (error) {
      this.logger.error('Failed to save settings', error);
      throw error;
    }
  }
}

export class InMemorySettingsStore implements ISettingsStore {
  private readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  async get(key: string, defaultValue = ''): Promise<string> {
    return this.values.get(key) ?? defaultValue;
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }
}
