export type ChunkScope = 'global' | 'group';

export type ChunkVisibility = { scope: 'global' } | { scope: 'group'; groupId: string };

export const ENTITY_CATEGORIES = ['statuses', 'modes', 'identities', 'egos', 'sinners'] as const;

export type EntityCategory = (typeof ENTITY_CATEGORIES)[number];

export type ChunkEntities = Record<EntityCategory, string[]>;

export function emptyEntities(): ChunkEntities {
  return { statuses: [], modes: [], identities: [], egos: [], sinners: [] };
}

export function cloneEntities(entities: ChunkEntities): ChunkEntities {
  return {
    statuses: [...entities.statuses],
    modes: [...entities.modes],
    identities: [...entities.identities],
    egos: [...entities.egos],
    sinners: [...entities.sinners],
  };
}

/** Output of the chunker for one document, before tagging. */
export interface ChunkDraft {
  content: string;
  index: number;
  docName: string;
  /** Visual length of `content`; informational only. */
  charCount: number;
}

export interface TaggedChunk extends ChunkDraft {
  tags: string[];
  entities: ChunkEntities;
}

interface GuideChunkFields {
  id: string;
  docId: string;
  index: number;
  content: string;
  tags: string[];
  entities: ChunkEntities;
}

/** A persisted, searchable chunk. */
export type GuideChunk = GuideChunkFields & ChunkVisibility;

export interface LexicalScoreBreakdown {
  kind: 'lexical';
  bm25: number;
  tagBoost: number;
  groupBoost: number;
  matchingTags: string[];
}

export interface SemanticScoreBreakdown {
  kind: 'semantic';
  similarity: number;
  tagBoost: number;
  groupBoost: number;
  matchingTags: string[];
}

export type ScoreBreakdown = LexicalScoreBreakdown | SemanticScoreBreakdown;

/** Copy that shares no arrays with `chunk`. */
export function cloneChunk(chunk: GuideChunk): GuideChunk {
  return { ...chunk, tags: [...chunk.tags], entities: cloneEntities(chunk.entities) };
}

export type SearchResult = GuideChunk & {
  score: number;
  scoreBreakdown: ScoreBreakdown;
  /** Score before reranking replaced it. */
  previousScore?: number;
};

export type SimpleSearchResult = GuideChunk & { score: number };

export interface ProcessedQuery {
  originalQuery: string;
  processedQuery: string;
  tokens: string[];
  tags: Set<string>;
}

export interface SearchDebugInfo {
  results: SearchResult[];
  queryInfo: {
    originalQuery: string;
    processedQuery: string;
    tokens: string[];
    extractedTags: string[];
    aliasSubstitutions: string[];
  };
  stats: {
    totalChunks: number;
    resultsCount: number;
    avgDocLen: number;
    uniqueTerms: number;
  };
}

export interface ChunkSearcher<TResult extends GuideChunk & { score: number } = GuideChunk & { score: number }> {
  readonly size: number;
  updateChunks(chunks: readonly GuideChunk[]): void;
  updateAliases(aliases: ReadonlyMap<string, string>): void;
  search(query: string, topK?: number, groupId?: string): TResult[];
  searchAsync(query: string, topK?: number, groupId?: string): Promise<TResult[]>;
}

export function matchesGroup(chunk: ChunkVisibility, groupId: string | undefined): boolean {
  return Boolean(groupId) && chunk.scope === 'group' && chunk.groupId === groupId;
}
