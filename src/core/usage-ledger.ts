import { z } from 'zod';
import { ILogger } from '../interfaces/logger.interface.js';
import { ISettingsStore } from '../interfaces/settings_store.interface.js';
import { TokenUsage, UsageEntry } from '../types/index.js';

export const USAGE_SETTING_KEY = 'api_usage';

const UsageEntrySchema = z.object({
  promptTokens: z.number().nonnegative(),
  completionTokens: z.number().nonnegative(),
  totalTokens: z.number().nonnegative(),
  requestCount: z.number().int().nonnegative(),
});

const LedgerSchema = z.record(z.record(UsageEntrySchema));

export type UsageSnapshot = Record<string, Record<string, UsageEntry>>;

export interface UsageLedgerOptions {
  readonly store?: ISettingsStore;
  readonly logger?: ILogger;
  readonly now?: () => Date;
}

const EMPTY_ENTRY: UsageEntry = { promptTokens: 0, completionTokens: 0, totalTokens: 0, requestCount: 0 };

/** Per-provider, per-UTC-day token and request counters. */
export class UsageLedger {
  private readonly entries: UsageSnapshot = {};
  private persistChain: Promise<void> = Promise.resolve();

  constructor(private readonly options: UsageLedgerOptions = {}) {}

  async load(): Promise<void> {
    const { store } = this.options;
    if (!store) {
      return;
    }

    const raw = await store.get(USAGE_SETTING_KEY, '');
    if (!raw) {
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      data = undefined;
    }

    const parsed = LedgerSchema.safeParse(data);
    if (!parsed.success) {
      this.options.logger?.warn('Ignoring malformed usage ledger');
      return;
    }

    for (const [providerId, days] of Object.entries(parsed.data)) {
      this.entries[providerId] = { ...days, ...this.entries[providerId] };
    }
  }

  /**
   * Adds one request's usage. The in-memory update happens before the first
   * await, so concurrent callers never lose an increment.
   */
  async record(providerId: string, usage: TokenUsage): Promise<UsageEntry> {
    const day = this.today();
    const days = (this.entries[providerId] ??= {});
    const current = days[day] ?? EMPTY_ENTRY;

    const next: UsageEntry = {
      promptTokens: current.promptTokens + usage.promptTokens,
      completionTokens: current.completionTokens + usage.completionTokens,
      totalTokens: current.totalTokens + usage.totalTokens,
      requestCount: current.requestCount + 1,
    };
    days[day] = next;

    await this.persist();
    return next;
  }

  get(providerId: string, day: string = this.today()): UsageEntry {
    return this.entries[providerId]?.[day] ?? EMPTY_ENTRY;
  }

  snapshot(): UsageSnapshot {
    return structuredClone(this.entries);
  }

  today(): string {
    const now = this.options.now ? this.options.now() : new Date();
    return now.toISOString().slice(0, 10);
  }

  private async persist(): Promise<void> {
    const { store } = this.options;
    if (!store) {
      return;
    }

    const serialized = JSON.stringify(this.entries);
    this.persistChain = this.persistChain.then(async () => {
      try {
        await store.set(USAGE_SETTING_KEY, serialized);
      } catch (error) {
        this.options.logger?.error('Failed to persist usage ledger', error);
      }
    });
    await this.persistChain;
  }
}
