// src/lib/sessionRegistry.ts
import { randomBytes } from 'crypto';

interface Entry<T> {
  value: T;
  expiresAt: number;
}

export interface SessionRegistryOptions<T> {
  /** Idle time before a session expires */
  ttlMs: number;
  /** Called once for every evicted session (expiry, delete or clear) */
  dispose?: (value: T, sessionId: string) => void;
  now?: () => number;
}

/**
 * Generate a cryptographically secure session ID
 */
export function generateSessionId(): string {
  return randomBytes(32).toString('hex');
}

/**
 * In-memory session table with a sliding expiry.
 *
 * Every successful get() pushes the expiry out by ttlMs. Expired entries are
 * evicted lazily on access and in bulk by sweep().
 */
export class SessionRegistry<T> {
  private entries = new Map<string, Entry<T>>();
  private readonly ttlMs: number;
  private readonly dispose?: (value: T, sessionId: string) => void;
  private readonly now: () => number;

  constructor(options: SessionRegistryOptions<T>) {
    this.ttlMs = options.ttlMs;
    this.dispose = options.dispose;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Store a value under a session id (a new one unless given)
   *
   * @returns The session id
   */
  create(value: T, sessionId: string = generateSessionId()): string {
    this.entries.set(sessionId, { value, expiresAt: this.now() + this.ttlMs });
    return sessionId;
  }

  get(sessionId: string): T | null {
    const entry = this.entries.get(sessionId);
    if (!entry) {
      return null;
    }

    const now = this.now();
    if (entry.expiresAt <= now) {
      this.evict(sessionId, entry);
      return null;
    }

    entry.expiresAt = now + this.ttlMs;
    return entry.value;
  }

  /**
   * @returns true if the session existed
   */
  delete(sessionId: string): boolean {
    const entry = this.entries.get(sessionId);
    if (!entry) {
      return false;
    }
    this.evict(sessionId, entry);
    return true;
  }

  /**
   * Evict every expired session
   *
   * @returns Number of sessions evicted
   */
  sweep(now: number = this.now()): number {
    let evicted = 0;
    for (const [sessionId, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.evict(sessionId, entry);
        evicted++;
      }
    }
    return evicted;
  }

  /**
   * Evict everything (server shutdown)
   */
  clear(): void {
    for (const [sessionId, entry] of this.entries) {
      this.evict(sessionId, entry);
    }
  }

  private evict(sessionId: string, entry: Entry<T>): void {
    this.entries.delete(sessionId);
    this.dispose?.(entry.value, sessionId);
  }
}
