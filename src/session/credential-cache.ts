/**
 * Process-wide cache of API responses (identity, account info).
 *
 * Passed explicitly to whoever reads or invalidates it; a login flushes it
 * before the new session is written so a stale identity is never served.
 */
export class CredentialCache<V> {
  private readonly entries = new Map<string, { value: V; expiresAt: number | null }>();

  constructor(private readonly now: () => number = Date.now) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V, ttlMs?: number): void {
    this.entries.set(key, {
      value,
      expiresAt: ttlMs === undefined ? null : this.now() + ttlMs,
    });
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  flushAll(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
