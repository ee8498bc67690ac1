import { DEFAULT_TOP_K, normalizeTopK } from './searcher';
import { cloneChunk, matchesGroup, type ChunkSearcher, type GuideChunk, type SimpleSearchResult } from './types';

const GROUP_MULTIPLIER = 1.2;

/**
 * Keyword-overlap ranking kept as a degraded drop-in for the BM25 searcher:
 * the score is the number of distinct whitespace-separated query words found in
 * the chunk, times 1.2 for the caller's own group chunks.
 */
export class SimpleSearcher implements ChunkSearcher<SimpleSearchResult> {
  private chunks: readonly GuideChunk[];
  private aliases: ReadonlyArray<readonly [string, string]>;

  constructor(chunks: readonly GuideChunk[] = [], aliases: ReadonlyMap<string, string> = new Map()) {
    this.chunks = chunks.map(cloneChunk);
    this.aliases = this.toAliasList(aliases);
  }

  get size(): number {
    return this.chunks.length;
  }

  updateChunks(chunks: readonly GuideChunk[]): void {
    this.chunks = chunks.map(cloneChunk);
  }

  updateAliases(aliases: ReadonlyMap<string, string>): void {
    this.aliases = this.toAliasList(aliases);
  }

  search(query: string, topK = DEFAULT_TOP_K, groupId?: string): SimpleSearchResult[] {
    const chunks = this.chunks;
    if (chunks.length === 0) {
      return [];
    }

    let processed = query.toLowerCase();
    for (const [alias, canonical] of this.aliases) {
      processed = processed.replaceAll(alias, canonical.toLowerCase());
    }
    const keywords = [...new Set(processed.split(/\s+/).filter(Boolean))];

    const scored: SimpleSearchResult[] = [];
    for (const chunk of chunks) {
      const content = chunk.content.toLowerCase();
      const matchCount = keywords.filter((keyword) => content.includes(keyword)).length;
      if (matchCount > 0) {
        const score = matchesGroup(chunk, groupId) ? matchCount * GROUP_MULTIPLIER : matchCount;
        scored.push({ ...cloneChunk(chunk), score });
      }
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, normalizeTopK(topK));
  }

  async searchAsync(query: string, topK = DEFAULT_TOP_K, groupId?: string): Promise<SimpleSearchResult[]> {
    return this.search(query, topK, groupId);
  }

  private toAliasList(aliases: ReadonlyMap<string, string>): Array<[string, string]> {
    return [...aliases.entries()]
      .map(([alias, canonical]): [string, string] => [alias.trim().toLowerCase(), canonical])
      .filter(([alias]) => alias.length > 0);
  }
}
