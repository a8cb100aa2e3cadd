/**
 * Memoizing cache for per-region lookups
 */
import { errorMessage } from '@snapshot-audit/shared';

/**
 * Result of a single provider lookup. `failed` lookups are reported to
 * callers as "nothing found" but stay distinguishable here.
 */
export type LookupOutcome<T> =
  | { status: 'found'; value: T }
  | { status: 'not-found' }
  | { status: 'failed'; error: string };

/**
 * Keyed by `region:id`. Stores the pending promise, so concurrent lookups of
 * one key share a single provider call. Entries never expire.
 */
export class LookupCache<T> {
  private entries = new Map<string, Promise<LookupOutcome<T>>>();

  static key(region: string, id: string): string {
    return `${region}:${id}`;
  }

  getOrLoad(
    region: string,
    id: string,
    load: () => Promise<LookupOutcome<T>>
  ): Promise<LookupOutcome<T>> {
    const key = LookupCache.key(region, id);
    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }

    const pending = load().catch(
      (error): LookupOutcome<T> => ({ status: 'failed', error: errorMessage(error) })
    );
    this.entries.set(key, pending);
    return pending;
  }

  has(region: string, id: string): boolean {
    return this.entries.has(LookupCache.key(region, id));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
