import { Chunker } from './chunker';
import type {
  AliasRecord,
  GroupSettingsRecord,
  GuideDocumentRecord,
  KnowledgeStore,
  ScopeFilter,
} from './knowledgeStore';
import {
  buildContextPrompt,
  buildSystemPrompt,
  detectModeFromQuery,
  type AnswerMode,
  type StatusReport,
} from './prompts';
import { UnavailableChatCompleter, type ChatCompleter } from './providers';
import { DEFAULT_TOP_K } from './searcher';
import { LruCache } from './lruCache';
import { getTagStatistics, Tagger } from './tagger';
import type { ChunkSearcher, ChunkVisibility, GuideChunk, SearchDebugInfo } from './types';

export type SearchHit = GuideChunk & { score: number };

export interface GuideSearchEngine extends ChunkSearcher<SearchHit> {
  searchWithDebug?(query: string, topK?: number, groupId?: string): Promise<SearchDebugInfo>;
}

export interface GuideServiceDeps {
  store: KnowledgeStore;
  createSearcher: () => GuideSearchEngine;
  chunker?: Chunker;
  tagger?: Tagger;
  llm?: ChatCompleter;
  topK?: number;
  /** Upper bound on cached per-group searchers; the least recently queried group is rebuilt on its next query. */
  maxCachedSearchers?: number;
}

export interface IngestInput {
  name: string;
  rawText: string;
  visibility: ChunkVisibility;
}

export interface IngestResult {
  document: GuideDocumentRecord;
  chunkCount: number;
  charCount: number;
  tagStats: Array<[string, number]>;
}

export interface AnswerOptions {
  groupId?: string;
  mode?: AnswerMode;
  topK?: number;
}

export type AnswerOutcome =
  | { kind: 'empty-question' }
  | { kind: 'empty-knowledge-base' }
  | { kind: 'no-results'; mode: AnswerMode }
  | { kind: 'llm-unavailable'; mode: AnswerMode; results: SearchHit[] }
  | { kind: 'answered'; mode: AnswerMode; answer: string; results: SearchHit[] };

export interface SearchOptions {
  groupId?: string;
  topK?: number;
}

export type SearchDebugOutcome = SearchDebugInfo | { results: SearchHit[] };

const GLOBAL_INDEX_KEY = '';
export const DEFAULT_MAX_CACHED_SEARCHERS = 32;
const LOOKUP_RESULT_COUNT = 3;
const LOOKUP_EXCERPT_LENGTH = 300;

/**
 * Ties storage, ingestion and retrieval together. Each group gets its own
 * searcher over the chunks it can see, kept in a bounded LRU; any write drops
 * all of them and the next query rebuilds from storage.
 */
export class GuideService {
  readonly store: KnowledgeStore;
  readonly chunker: Chunker;
  readonly tagger: Tagger;
  readonly topK: number;
  private readonly llm: ChatCompleter;
  private readonly createSearcher: () => GuideSearchEngine;
  private readonly searchers: LruCache<string, Promise<GuideSearchEngine>>;

  constructor(deps: GuideServiceDeps) {
    this.store = deps.store;
    this.createSearcher = deps.createSearcher;
    this.chunker = deps.chunker ?? new Chunker();
    this.tagger = deps.tagger ?? new Tagger();
    this.llm = deps.llm ?? new UnavailableChatCompleter();
    this.topK = deps.topK ?? DEFAULT_TOP_K;
    this.searchers = new LruCache(deps.maxCachedSearchers ?? DEFAULT_MAX_CACHED_SEARCHERS);
  }

  get cachedSearcherCount(): number {
    return this.searchers.size;
  }

  async ingestDocument(input: IngestInput): Promise<IngestResult | null> {
    const drafts = this.chunker.processDocument(input.rawText, input.name);
    if (drafts.length === 0) {
      return null;
    }
    const chunks = this.tagger.tagMany(drafts);

    const document = await this.store.addDocument(input);
    try {
      await this.store.addChunks(document.id, chunks, input.visibility);
    } catch (error) {
      // Roll back so a document never exists without its chunks.
      await this.store.deleteDocument(document.id).catch((cleanupError: unknown) => {
        console.error(`[guide:ingest] failed to remove partial document ${document.id}:`, cleanupError);
        return false;
      });
      throw error;
    }
    if (input.visibility.scope === 'group') {
      await this.store.updateGroupSettings(input.visibility.groupId, { lastImportAt: new Date() });
    }
    this.invalidate();

    console.log(`[guide:ingest] ${input.name} -> ${chunks.length} chunks (${document.scope})`);
    return {
      document,
      chunkCount: chunks.length,
      charCount: Array.from(input.rawText).length,
      tagStats: getTagStatistics(chunks),
    };
  }

  async deleteDocument(id: string): Promise<boolean> {
    const deleted = await this.store.deleteDocument(id);
    if (deleted) {
      this.invalidate();
    }
    return deleted;
  }

  async clearDocuments(filter?: ScopeFilter): Promise<number> {
    const removed = await this.store.clearDocuments(filter);
    this.invalidate();
    return removed;
  }

  async upsertAlias(alias: string, canonical: string, type?: string): Promise<AliasRecord> {
    const saved = await this.store.upsertAlias(alias, canonical, type);
    this.invalidate();
    return saved;
  }

  async deleteAlias(alias: string): Promise<boolean> {
    const deleted = await this.store.deleteAlias(alias);
    if (deleted) {
      this.invalidate();
    }
    return deleted;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    const searcher = await this.getSearcher(options.groupId);
    return searcher.searchAsync(query, options.topK ?? this.topK, options.groupId);
  }

  async searchDebug(query: string, options: SearchOptions = {}): Promise<SearchDebugOutcome> {
    const searcher = await this.getSearcher(options.groupId);
    const topK = options.topK ?? this.topK;
    if (searcher.searchWithDebug) {
      return searcher.searchWithDebug(query, topK, options.groupId);
    }
    return { results: await searcher.searchAsync(query, topK, options.groupId) };
  }

  /** Empty knowledge base and no match are reported as distinct outcomes. */
  async answer(question: string, options: AnswerOptions = {}): Promise<AnswerOutcome> {
    const trimmed = question.trim();
    if (!trimmed) {
      return { kind: 'empty-question' };
    }

    const stats = await this.store.getStats(options.groupId);
    if (stats.total.chunkCount === 0) {
      return { kind: 'empty-knowledge-base' };
    }

    const defaultMode = options.groupId
      ? (await this.store.getGroupSettings(options.groupId)).defaultMode
      : 'simple';
    const mode = options.mode ?? detectModeFromQuery(trimmed, defaultMode);

    const results = await this.search(trimmed, { groupId: options.groupId, topK: options.topK });
    if (results.length === 0) {
      return { kind: 'no-results', mode };
    }
    if (!this.llm.available) {
      return { kind: 'llm-unavailable', mode, results };
    }

    const answer = await this.llm.complete(buildSystemPrompt(mode), buildContextPrompt(results, trimmed));
    return { kind: 'answered', mode, answer, results };
  }

  /** Plain-text evidence for tool-style callers that run their own model. */
  async lookup(question: string, groupId?: string): Promise<string> {
    const results = await this.search(question, { groupId });
    if (results.length === 0) {
      return '知识库中没有找到相关信息，请建议用户补充相关攻略文档。';
    }
    const parts = results
      .slice(0, LOOKUP_RESULT_COUNT)
      .map((chunk, i) => `[参考${i + 1}] ${Array.from(chunk.content).slice(0, LOOKUP_EXCERPT_LENGTH).join('')}...`);
    return `找到以下相关信息：\n\n${parts.join('\n\n')}`;
  }

  async getStatus(groupId: string): Promise<StatusReport> {
    const [stats, settings] = await Promise.all([this.store.getStats(groupId), this.store.getGroupSettings(groupId)]);
    return {
      groupId,
      defaultMode: settings.defaultMode,
      lastImportAt: settings.lastImportAt,
      globalDocs: stats.global.docCount,
      globalChunks: stats.global.chunkCount,
      groupDocs: stats.group.docCount,
      groupChunks: stats.group.chunkCount,
      topK: this.topK,
      chunkSize: this.chunker.chunkSize,
      overlap: this.chunker.overlap,
    };
  }

  async setDefaultMode(groupId: string, mode: AnswerMode): Promise<GroupSettingsRecord> {
    return this.store.updateGroupSettings(groupId, { defaultMode: mode });
  }

  /** Drops every cached searcher; the next query per group rebuilds from storage. */
  invalidate(): void {
    this.searchers.clear();
  }

  getSearcher(groupId?: string): Promise<GuideSearchEngine> {
    const key = groupId ?? GLOBAL_INDEX_KEY;
    const cached = this.searchers.get(key);
    if (cached) {
      return cached;
    }

    const pending: Promise<GuideSearchEngine> = this.buildSearcher(groupId).catch((error: unknown) => {
      if (this.searchers.peek(key) === pending) {
        this.searchers.delete(key);
      }
      throw error;
    });
    this.searchers.put(key, pending);
    return pending;
  }

  private async buildSearcher(groupId?: string): Promise<GuideSearchEngine> {
    const [chunks, aliases] = await Promise.all([this.store.getChunksForSearch(groupId), this.store.getAliasMap()]);
    const searcher = this.createSearcher();
    searcher.updateAliases(aliases);
    searcher.updateChunks(chunks);
    console.log(`[guide:index] rebuilt ${groupId ? `group ${groupId}` : 'global'} index with ${chunks.length} chunks`);
    return searcher;
  }
}
