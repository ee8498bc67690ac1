import { LruCache } from './lruCache';
import type { EmbeddingProvider } from './providers';

export const DEFAULT_EMBEDDING_CACHE_SIZE = 5000;

/**
 * Wraps an embedding provider with an LRU cache keyed by text. Searchers are
 * rebuilt per group and on every write, so the global chunks they share are
 * only sent to the inner provider once. Only texts missing from the cache
 * reach it, in a single batch; a failed batch caches nothing.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  readonly cache: LruCache<string, number[]>;

  constructor(
    private readonly inner: EmbeddingProvider,
    maxEntries = DEFAULT_EMBEDDING_CACHE_SIZE
  ) {
    this.cache = new LruCache(maxEntries);
  }

  get enabled(): boolean {
    return this.inner.enabled;
  }

  async getEmbedding(text: string): Promise<number[]> {
    const cached = this.cache.get(text);
    if (cached) {
      return cached;
    }
    const vector = await this.inner.getEmbedding(text);
    this.cache.put(text, vector);
    return vector;
  }

  async getEmbeddings(texts: string[]): Promise<number[][]> {
    const resolved = new Map<string, number[]>();
    const pending = new Set<string>();
    for (const text of texts) {
      if (resolved.has(text) || pending.has(text)) {
        continue;
      }
      const cached = this.cache.get(text);
      if (cached) {
        resolved.set(text, cached);
      } else {
        pending.add(text);
      }
    }

    const missing = [...pending];
    if (missing.length > 0) {
      const fresh = await this.inner.getEmbeddings(missing);
      if (fresh.length !== missing.length) {
        throw new Error(`Expected ${missing.length} embeddings, got ${fresh.length}`);
      }
      missing.forEach((text, i) => {
        resolved.set(text, fresh[i]);
        this.cache.put(text, fresh[i]);
      });
    }

    return texts.map((text) => {
      const vector = resolved.get(text);
      if (!vector) {
        throw new Error('Embedding batch lost a text');
      }
      return vector;
    });
  }
}
