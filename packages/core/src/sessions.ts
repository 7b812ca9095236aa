/**
 * Session Registry
 *
 * Process-wide per-user state with an explicit lifecycle. One registry
 * instance per kind of state (conversations, active jobs, progress);
 * every entry is created, looked up and evicted through this API.
 */

export type EvictionCause = 'evicted' | 'expired' | 'replaced';

export interface SessionRegistryOptions<T> {
  /** Entries older than this are expired lazily on lookup */
  ttlMs?: number;
  /** Invoked once for every entry leaving the registry */
  onEvict?: (userId: number, value: T, cause: EvictionCause) => void;
  now?: () => number;
}

interface Entry<T> {
  value: T;
  createdAt: number;
}

export class SessionRegistry<T> {
  private readonly entries = new Map<number, Entry<T>>();
  private readonly ttlMs?: number;
  private readonly onEvict?: SessionRegistryOptions<T>['onEvict'];
  private readonly now: () => number;

  constructor(options: SessionRegistryOptions<T> = {}) {
    this.ttlMs = options.ttlMs;
    this.onEvict = options.onEvict;
    this.now = options.now ?? Date.now;
  }

  /**
   * Store a value for the user, replacing (and evicting) any previous one
   */
  create(userId: number, value: T): T {
    const previous = this.entries.get(userId);
    this.entries.set(userId, { value, createdAt: this.now() });
    if (previous) {
      this.onEvict?.(userId, previous.value, 'replaced');
    }
    return value;
  }

  /**
   * Store a value only when the user has none. Returns false when occupied.
   */
  tryCreate(userId: number, value: T): boolean {
    if (this.has(userId)) {
      return false;
    }
    this.entries.set(userId, { value, createdAt: this.now() });
    return true;
  }

  lookup(userId: number): T | undefined {
    const entry = this.entries.get(userId);
    if (!entry) {
      return undefined;
    }
    if (this.ttlMs !== undefined && this.now() - entry.createdAt >= this.ttlMs) {
      this.entries.delete(userId);
      this.onEvict?.(userId, entry.value, 'expired');
      return undefined;
    }
    return entry.value;
  }

  has(userId: number): boolean {
    return this.lookup(userId) !== undefined;
  }

  /**
   * Remove the user's entry. Returns the evicted value, if any.
   */
  evict(userId: number): T | undefined {
    const entry = this.entries.get(userId);
    if (!entry) {
      return undefined;
    }
    this.entries.delete(userId);
    this.onEvict?.(userId, entry.value, 'evicted');
    return entry.value;
  }

  /**
   * Remove the entry only if it still holds `value`
   */
  evictIf(userId: number, value: T): boolean {
    const entry = this.entries.get(userId);
    if (!entry || entry.value !== value) {
      return false;
    }
    this.evict(userId);
    return true;
  }

  get size(): number {
    return this.entries.size;
  }
}
