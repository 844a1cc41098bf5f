import { recordCacheEvent } from "./observability/metrics";

/**
 * Full parameter tuple of one fetch. `identity` ties entries to the signed-in user.
 */
export interface QueryKey {
  companies: readonly string[];
  start: string | null;
  end: string | null;
  includeDrafts: boolean;
  identity: string;
}

export function serializeQueryKey(key: QueryKey): string {
  return JSON.stringify([key.companies, key.start, key.end, key.includeDrafts, key.identity]);
}

/**
 * Session-scoped memo of fetch results. Callers asking for the same key while a
 * load is in flight share its promise; a failed load is evicted so the next call
 * retries. Entries are only ever dropped all at once.
 */
export class QueryCache<T> {
  private readonly entries = new Map<string, Promise<T>>();

  constructor(readonly name: string) {}

  get size(): number {
    return this.entries.size;
  }

  has(key: QueryKey): boolean {
    return this.entries.has(serializeQueryKey(key));
  }

  getOrLoad(key: QueryKey, loader: () => Promise<T>): Promise<T> {
    const id = serializeQueryKey(key);
    const cached = this.entries.get(id);
    if (cached) {
      recordCacheEvent("hit");
      return cached;
    }

    recordCacheEvent("miss");
    const pending: Promise<T> = loader().catch((error: unknown) => {
      if (this.entries.get(id) === pending) {
        this.entries.delete(id);
      }
      throw error;
    });
    this.entries.set(id, pending);
    return pending;
  }

  clear(): void {
    this.entries.clear();
  }
}
