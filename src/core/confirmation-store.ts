import crypto from 'crypto';
import { ConfirmationExpiredError } from '../errors/index.js';
import { Result } from '../types/index.js';
import { err, ok } from '../utils/result.js';

export const CONFIRMATION_TTL_SECONDS = 300;

export interface ConfirmationStoreOptions {
  readonly ttlSeconds?: number;
  readonly now?: () => number;
}

interface PendingEntry<T> {
  readonly payload: T;
  readonly expiresAt: number;
}

/** One-time tokens for actions waiting on the user's go-ahead. */
export class ConfirmationStore<T> {
  private readonly pending = new Map<string, PendingEntry<T>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ConfirmationStoreOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? CONFIRMATION_TTL_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  get ttlSeconds(): number {
    return this.ttlMs / 1000;
  }

  create(payload: T): string {
    this.sweep();
    const token = crypto.randomBytes(32).toString('hex');
    this.pending.set(token, { payload, expiresAt: this.now() + this.ttlMs });
    return token;
  }

  /** Removes the entry; a token can be redeemed once. */
  take(token: string): Result<T, ConfirmationExpiredError> {
    const entry = this.pending.get(token);
    this.pending.delete(token);
    if (!entry || entry.expiresAt <= this.now()) {
      return err(new ConfirmationExpiredError());
    }
    return ok(entry.payload);
  }

  discard(token: string): boolean {
    return this.pending.delete(token);
  }

  get size(): number {
    return this.pending.size;
  }

  private sweep(): void {
    const now = this.now();
    for (const [token, entry] of this.pending) {
      if (entry.expiresAt <= now) {
        this.pending.delete(token);
      }
    }
  }
}
