import { extractQueryTags } from './tagger';
import { cosineSimilarity, countTerms, escapeRegExp, tokenize } from './textUtils';
import {
  DisabledEmbeddingProvider,
  DisabledRerankProvider,
  type EmbeddingProvider,
  type RerankProvider,
} from './providers';
import {
  cloneChunk,
  matchesGroup,
  type ChunkSearcher,
  type GuideChunk,
  type ProcessedQuery,
  type SearchDebugInfo,
  type SearchResult,
} from './types';

export interface SearchWeights {
  k1: number;
  b: number;
  tagBoost: number;
  groupBoost: number;
  semanticTagBoost: number;
  semanticGroupBoost: number;
}

export const DEFAULT_SEARCH_WEIGHTS: Readonly<SearchWeights> = {
  k1: 1.5,
  b: 0.75,
  tagBoost: 1.5,
  groupBoost: 1.2,
  semanticTagBoost: 0.1,
  semanticGroupBoost: 0.1,
};

export const DEFAULT_TOP_K = 6;

/**
 * Immutable BM25 statistics for one chunk set. A new index is built for every
 * change and swapped in whole; nothing patches an existing one. The index owns
 * private copies of its chunks and hands out copies in results.
 */
export interface Bm25Index {
  readonly chunks: readonly GuideChunk[];
  readonly termFreqs: ReadonlyArray<ReadonlyMap<string, number>>;
  readonly docLens: readonly number[];
  readonly docFreq: ReadonlyMap<string, number>;
  readonly avgDocLen: number;
}

export function buildBm25Index(chunks: readonly GuideChunk[]): Bm25Index {
  const snapshot = chunks.map(cloneChunk);
  const termFreqs: Array<Map<string, number>> = [];
  const docLens: number[] = [];
  const docFreq = new Map<string, number>();

  for (const chunk of snapshot) {
    const tokens = tokenize(chunk.content);
    const tf = countTerms(tokens);
    termFreqs.push(tf);
    docLens.push(tokens.length);
    for (const term of tf.keys()) {
      docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
    }
  }

  const avgDocLen = docLens.length ? docLens.reduce((sum, len) => sum + len, 0) / docLens.length : 0;
  return Object.freeze({ chunks: snapshot, termFreqs, docLens, docFreq, avgDocLen });
}

export function bm25Score(
  index: Bm25Index,
  queryTokens: readonly string[],
  docIdx: number,
  weights: Pick<SearchWeights, 'k1' | 'b'> = DEFAULT_SEARCH_WEIGHTS
): number {
  const numDocs = index.chunks.length;
  const docLen = index.docLens[docIdx];
  const tf = index.termFreqs[docIdx];
  let score = 0;

  for (const term of queryTokens) {
    const df = index.docFreq.get(term);
    if (df === undefined) {
      continue;
    }
    const idf = Math.log((numDocs - df + 0.5) / (df + 0.5) + 1);
    const freq = tf.get(term) ?? 0;
    const tfNorm =
      (freq * (weights.k1 + 1)) / (freq + weights.k1 * (1 - weights.b + (weights.b * docLen) / index.avgDocLen));
    score += idf * tfNorm;
  }

  return score;
}

export interface AliasTable {
  readonly entries: ReadonlyArray<readonly [string, string]>;
  readonly pattern: RegExp | null;
}

/**
 * Longest alias first (ties in code-point order), matched in a single pass, so
 * overlapping aliases resolve the same way for a given map and canonical terms
 * are never rewritten again.
 */
export function compileAliases(aliases: ReadonlyMap<string, string>): AliasTable {
  const entries = [...aliases.entries()]
    .map(([alias, canonical]): [string, string] => [alias.trim().toLowerCase(), canonical])
    .filter(([alias]) => alias.length > 0)
    .sort(([a], [b]) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));

  const pattern = entries.length ? new RegExp(entries.map(([alias]) => escapeRegExp(alias)).join('|'), 'gi') : null;
  return { entries, pattern };
}

export function applyAliases(query: string, table: AliasTable): string {
  const lowered = query.toLowerCase();
  if (!table.pattern) {
    return lowered;
  }
  const lookup = new Map(table.entries);
  return lowered.replace(table.pattern, (match) => lookup.get(match.toLowerCase()) ?? match);
}

export function normalizeTopK(topK: number): number {
  return Number.isFinite(topK) ? Math.max(0, Math.floor(topK)) : 0;
}

function byScoreDesc(a: { score: number }, b: { score: number }): number {
  return b.score - a.score;
}

function intersectTags(queryTags: ReadonlySet<string>, chunkTags: readonly string[]): string[] {
  return [...new Set(chunkTags)].filter((tag) => queryTags.has(tag));
}

export interface SearcherOptions {
  chunks?: readonly GuideChunk[];
  aliases?: ReadonlyMap<string, string>;
  embeddingProvider?: EmbeddingProvider;
  rerankProvider?: RerankProvider;
  weights?: Partial<SearchWeights>;
}

interface EmbeddingCacheEntry {
  index: Bm25Index;
  vectors: Promise<number[][]>;
}

/**
 * BM25 ranking with tag and group boosts, plus optional embedding search and
 * reranking that fall back to the lexical path when the provider fails.
 */
export class Searcher implements ChunkSearcher<SearchResult> {
  private index: Bm25Index;
  private aliases: AliasTable;
  private embeddingCache: EmbeddingCacheEntry | null = null;
  private readonly embeddingProvider: EmbeddingProvider;
  private readonly rerankProvider: RerankProvider;
  readonly weights: Readonly<SearchWeights>;

  constructor(options: SearcherOptions = {}) {
    this.index = buildBm25Index(options.chunks ?? []);
    this.aliases = compileAliases(options.aliases ?? new Map());
    this.embeddingProvider = options.embeddingProvider ?? new DisabledEmbeddingProvider();
    this.rerankProvider = options.rerankProvider ?? new DisabledRerankProvider();
    this.weights = { ...DEFAULT_SEARCH_WEIGHTS, ...options.weights };
  }

  get size(): number {
    return this.index.chunks.length;
  }

  get currentIndex(): Bm25Index {
    return this.index;
  }

  updateChunks(chunks: readonly GuideChunk[]): void {
    this.index = buildBm25Index(chunks);
    this.embeddingCache = null;
  }

  updateAliases(aliases: ReadonlyMap<string, string>): void {
    this.aliases = compileAliases(aliases);
  }

  processQuery(query: string): ProcessedQuery {
    const processedQuery = applyAliases(query, this.aliases);
    return {
      originalQuery: query,
      processedQuery,
      tokens: tokenize(processedQuery),
      tags: extractQueryTags(processedQuery),
    };
  }

  search(query: string, topK = DEFAULT_TOP_K, groupId?: string): SearchResult[] {
    const index = this.index;
    if (index.chunks.length === 0) {
      return [];
    }

    const { tokens, tags } = this.processQuery(query);
    if (tokens.length === 0) {
      return [];
    }

    const scored: SearchResult[] = [];
    index.chunks.forEach((chunk, docIdx) => {
      const bm25 = bm25Score(index, tokens, docIdx, this.weights);
      const matchingTags = intersectTags(tags, chunk.tags);
      const tagBoost = matchingTags.length * this.weights.tagBoost;
      const groupBoost = matchesGroup(chunk, groupId) ? this.weights.groupBoost : 0;
      const score = bm25 + tagBoost + groupBoost;

      if (score > 0) {
        scored.push({
          ...cloneChunk(chunk),
          score,
          scoreBreakdown: { kind: 'lexical', bm25, tagBoost, groupBoost, matchingTags },
        });
      }
    });

    return scored.sort(byScoreDesc).slice(0, normalizeTopK(topK));
  }

  async searchSemantic(query: string, topK = DEFAULT_TOP_K, groupId?: string): Promise<SearchResult[]> {
    const index = this.index;
    if (index.chunks.length === 0) {
      return [];
    }

    const { processedQuery, tokens, tags } = this.processQuery(query);
    if (tokens.length === 0) {
      return [];
    }

    try {
      const [vectors, queryVector] = await Promise.all([
        this.chunkEmbeddings(index),
        this.embeddingProvider.getEmbedding(processedQuery),
      ]);

      const scored: SearchResult[] = [];
      index.chunks.forEach((chunk, docIdx) => {
        const similarity = cosineSimilarity(queryVector, vectors[docIdx]);
        const matchingTags = intersectTags(tags, chunk.tags);
        const tagBoost = matchingTags.length * this.weights.semanticTagBoost;
        const groupBoost = matchesGroup(chunk, groupId) ? this.weights.semanticGroupBoost : 0;
        const score = similarity + tagBoost + groupBoost;

        if (score > 0) {
          scored.push({
            ...cloneChunk(chunk),
            score,
            scoreBreakdown: { kind: 'semantic', similarity, tagBoost, groupBoost, matchingTags },
          });
        }
      });

      return scored.sort(byScoreDesc).slice(0, normalizeTopK(topK));
    } catch (error) {
      console.warn('[guide:search] semantic search failed, fallback to lexical:', error);
      return this.search(query, topK, groupId);
    }
  }

  async rerank(query: string, candidates: SearchResult[], topK = DEFAULT_TOP_K): Promise<SearchResult[]> {
    const limit = normalizeTopK(topK);
    try {
      const items = await this.rerankProvider.rerank({
        query: applyAliases(query, this.aliases),
        documents: candidates.map((candidate) => candidate.content),
        topN: limit,
      });

      const seen = new Set<number>();
      const reranked: SearchResult[] = [];
      for (const item of items) {
        const candidate = candidates[item.index];
        if (!candidate || seen.has(item.index)) {
          continue;
        }
        seen.add(item.index);
        reranked.push({ ...candidate, score: item.relevanceScore, previousScore: candidate.score });
      }
      return reranked.slice(0, limit);
    } catch (error) {
      console.warn('[guide:search] rerank failed, keeping retrieval order:', error);
      return candidates.slice(0, limit);
    }
  }

  /** Over-fetch (3x semantic, 2x lexical with a reranker), then rerank down to `topK`. */
  async searchAsync(query: string, topK = DEFAULT_TOP_K, groupId?: string): Promise<SearchResult[]> {
    const limit = normalizeTopK(topK);
    const rerankEnabled = this.rerankProvider.enabled;

    let candidates = this.embeddingProvider.enabled
      ? await this.searchSemantic(query, limit * 3, groupId)
      : this.search(query, rerankEnabled ? limit * 2 : limit, groupId);

    if (rerankEnabled && candidates.length > 1) {
      candidates = await this.rerank(query, candidates, limit);
    }
    return candidates.slice(0, limit);
  }

  async searchWithDebug(query: string, topK = DEFAULT_TOP_K, groupId?: string): Promise<SearchDebugInfo> {
    const processed = this.processQuery(query);
    const results = await this.searchAsync(query, topK, groupId);
    const loweredQuery = query.toLowerCase();

    return {
      results,
      queryInfo: {
        originalQuery: query,
        processedQuery: processed.processedQuery,
        tokens: processed.tokens,
        extractedTags: [...processed.tags],
        aliasSubstitutions: this.aliases.entries
          .filter(([alias]) => loweredQuery.includes(alias))
          .map(([alias, canonical]) => `${alias} -> ${canonical}`),
      },
      stats: {
        totalChunks: this.index.chunks.length,
        resultsCount: results.length,
        avgDocLen: this.index.avgDocLen,
        uniqueTerms: this.index.docFreq.size,
      },
    };
  }

  /** One vector per chunk of `index`, computed once; a failed attempt leaves nothing cached. */
  private async chunkEmbeddings(index: Bm25Index): Promise<number[][]> {
    if (this.embeddingCache?.index === index) {
      return this.embeddingCache.vectors;
    }

    const contents = index.chunks.map((chunk) => chunk.content);
    const entry: EmbeddingCacheEntry = {
      index,
      vectors: this.embeddingProvider.getEmbeddings(contents).then((vectors) => {
        if (vectors.length !== contents.length) {
          throw new Error(`Expected ${contents.length} chunk embeddings, got ${vectors.length}`);
        }
        return vectors;
      }),
    };
    this.embeddingCache = entry;

    try {
      return await entry.vectors;
    } catch (error) {
      if (this.embeddingCache === entry) {
        this.embeddingCache = null;
      }
      throw error;
    }
  }
}
