import { CachedEmbeddingProvider } from '../src/services/guide/cachedEmbeddingProvider';
import { GuideService } from '../src/services/guide/guideService';
import type { EmbeddingProvider } from '../src/services/guide/providers';
import { Searcher } from '../src/services/guide/searcher';
import { FakeChatCompleter, MemoryKnowledgeStore } from './testStore';

const BURN_GUIDE = '燃烧队核心是叠加燃烧层数。';

function createService(llm?: FakeChatCompleter): { service: GuideService; store: MemoryKnowledgeStore } {
  const store = new MemoryKnowledgeStore();
  const service = new GuideService({ store, createSearcher: () => new Searcher(), llm });
  return { service, store };
}

class CountingEmbeddingProvider implements EmbeddingProvider {
  readonly enabled = true;
  embeddedTexts = 0;

  async getEmbedding(): Promise<number[]> {
    return [1, 0];
  }

  async getEmbeddings(texts: string[]): Promise<number[][]> {
    this.embeddedTexts += texts.length;
    return texts.map(() => [1, 0]);
  }
}

class ChunkWriteFailingStore extends MemoryKnowledgeStore {
  async addChunks(): Promise<void> {
    throw new Error('chunk write failed');
  }
}

describe('GuideService', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('ingestDocument', () => {
    test('whitespace text persists nothing', async () => {
      const { service, store } = createService();
      expect(await service.ingestDocument({ name: 'blank', rawText: ' \n\n ', visibility: { scope: 'global' } })).toBeNull();
      expect(store.documents).toEqual([]);
      expect(store.chunks).toEqual([]);
    });

    test('chunks, tags and stores a global document', async () => {
      const { service, store } = createService();
      const result = await service.ingestDocument({ name: 'burn.md', rawText: BURN_GUIDE, visibility: { scope: 'global' } });

      expect(result?.chunkCount).toBe(1);
      expect(result?.charCount).toBe(13);
      expect(result?.tagStats).toEqual([['状态:Burn', 1]]);
      expect(store.chunks.map((chunk) => [chunk.content, chunk.tags, chunk.scope])).toEqual([
        [BURN_GUIDE, ['状态:Burn'], 'global'],
      ]);
    });

    test('charCount counts code points', async () => {
      const { service, store } = createService();
      const result = await service.ingestDocument({ name: 'emoji', rawText: '燃烧队😀', visibility: { scope: 'global' } });
      expect(result?.charCount).toBe(4);
      expect(store.documents[0].rawTextLength).toBe(4);
    });

    test('a failed chunk write removes the document again', async () => {
      const store = new ChunkWriteFailingStore();
      const service = new GuideService({ store, createSearcher: () => new Searcher() });

      await expect(
        service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } })
      ).rejects.toThrow('chunk write failed');
      expect(store.documents).toEqual([]);
      expect(store.chunks).toEqual([]);
    });

    test('group imports record the import time', async () => {
      const { service, store } = createService();
      await service.ingestDocument({ name: 'g', rawText: '流血队思路', visibility: { scope: 'group', groupId: 'g1' } });
      expect((await store.getGroupSettings('g1')).lastImportAt).toBeInstanceOf(Date);
    });
  });

  describe('search', () => {
    test('group chunks are only visible to their own group', async () => {
      const { service } = createService();
      await service.ingestDocument({ name: 'g', rawText: '流血队思路', visibility: { scope: 'group', groupId: 'g1' } });

      expect(await service.search('流血', { groupId: 'g1' })).toHaveLength(1);
      expect(await service.search('流血', { groupId: 'g2' })).toEqual([]);
      expect(await service.search('流血')).toEqual([]);
    });

    test('writes invalidate the cached index', async () => {
      const { service } = createService();
      await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });
      expect(await service.search('流血')).toEqual([]);

      await service.ingestDocument({ name: 'bleed', rawText: '流血队思路', visibility: { scope: 'global' } });
      expect((await service.search('流血')).map((hit) => hit.content)).toEqual(['流血队思路']);
    });

    test('alias changes apply to the next query', async () => {
      const { service } = createService();
      await service.ingestDocument({ name: 'hl', rawText: '洪鹿适合破裂队', visibility: { scope: 'global' } });
      expect(await service.search('红叔')).toEqual([]);

      await service.upsertAlias('红叔', '洪鹿');
      expect(await service.search('红叔')).toHaveLength(1);

      await service.deleteAlias('红叔');
      expect(await service.search('红叔')).toEqual([]);
    });

    test('deleting and clearing documents removes their chunks from search', async () => {
      const { service } = createService();
      const first = await service.ingestDocument({ name: 'a', rawText: BURN_GUIDE, visibility: { scope: 'global' } });
      await service.ingestDocument({ name: 'b', rawText: '燃烧层数', visibility: { scope: 'group', groupId: 'g1' } });

      expect(await service.deleteDocument(first?.document.id ?? '')).toBe(true);
      expect(await service.search('燃烧', { groupId: 'g1' })).toHaveLength(1);

      expect(await service.clearDocuments({ scope: 'group', groupId: 'g1' })).toBe(1);
      expect(await service.search('燃烧', { groupId: 'g1' })).toEqual([]);
    });

    test('a failed index build is not cached', async () => {
      const { service, store } = createService();
      await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });
      jest.spyOn(store, 'getChunksForSearch').mockRejectedValueOnce(new Error('storage down'));

      await expect(service.search('燃烧')).rejects.toThrow('storage down');
      expect(await service.search('燃烧')).toHaveLength(1);
    });

    test('cached group searchers are bounded, least recently used first out', async () => {
      const store = new MemoryKnowledgeStore();
      const createSearcher = jest.fn(() => new Searcher());
      const service = new GuideService({ store, createSearcher, maxCachedSearchers: 2 });
      await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });

      for (const groupId of ['g1', 'g2', 'g3']) {
        await service.search('燃烧', { groupId });
      }
      expect(service.cachedSearcherCount).toBe(2);
      expect(createSearcher).toHaveBeenCalledTimes(3);

      await service.search('燃烧', { groupId: 'g3' });
      expect(createSearcher).toHaveBeenCalledTimes(3);

      await service.search('燃烧', { groupId: 'g1' });
      expect(createSearcher).toHaveBeenCalledTimes(4);
      await service.search('燃烧', { groupId: 'g3' });
      expect(createSearcher).toHaveBeenCalledTimes(4);
    });

    test('group searchers share embeddings of global chunks', async () => {
      const inner = new CountingEmbeddingProvider();
      const embeddingProvider = new CachedEmbeddingProvider(inner);
      const store = new MemoryKnowledgeStore();
      const service = new GuideService({ store, createSearcher: () => new Searcher({ embeddingProvider }) });
      await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });
      await service.ingestDocument({ name: 'bleed', rawText: '流血队思路', visibility: { scope: 'global' } });

      for (const groupId of ['g1', 'g2', 'g3']) {
        expect(await service.search('燃烧', { groupId })).toHaveLength(2);
      }
      expect(service.cachedSearcherCount).toBe(3);
      expect(inner.embeddedTexts).toBe(2);

      await service.ingestDocument({ name: 'g1', rawText: '破裂队思路', visibility: { scope: 'group', groupId: 'g1' } });
      expect(await service.search('燃烧', { groupId: 'g1' })).toHaveLength(3);
      expect(inner.embeddedTexts).toBe(3);
    });

    test('searchDebug returns the searcher debug report', async () => {
      const { service } = createService();
      await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });

      const debug = await service.searchDebug('燃烧');
      expect('queryInfo' in debug && debug.queryInfo.extractedTags).toEqual(['状态:Burn']);
      expect(debug.results).toHaveLength(1);
    });
  });

  describe('answer', () => {
    test('empty question', async () => {
      const { service } = createService();
      expect(await service.answer('  ')).toEqual({ kind: 'empty-question' });
    });

    test('empty knowledge base', async () => {
      const { service } = createService(new FakeChatCompleter());
      expect(await service.answer('燃烧队怎么配')).toEqual({ kind: 'empty-knowledge-base' });
    });

    test('no results', async () => {
      const { service } = createService(new FakeChatCompleter());
      await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });
      expect(await service.answer('xyz')).toEqual({ kind: 'no-results', mode: 'simple' });
    });

    test('results without an LLM', async () => {
      const { service } = createService();
      await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });
      const outcome = await service.answer('燃烧');
      expect(outcome.kind).toBe('llm-unavailable');
    });

    test('answers through the chat model with the retrieved context', async () => {
      const llm = new FakeChatCompleter();
      const { service, store } = createService(llm);
      await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });

      const outcome = await service.answer('燃烧队怎么配');
      expect(outcome).toMatchObject({ kind: 'answered', mode: 'detail', answer: 'test answer' });
      expect(llm.calls).toHaveLength(1);
      expect(llm.calls[0].systemPrompt).toContain('（详版）');
      expect(llm.calls[0].userPrompt).toContain(`--- Chunk ${store.chunks[0].id} [来源: 全局库] [标签: 状态:Burn] ---`);
    });

    test('group default mode applies when the question has no trigger', async () => {
      const { service } = createService(new FakeChatCompleter());
      await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });
      await service.setDefaultMode('g1', 'detail');

      expect(await service.answer('燃烧强吗', { groupId: 'g1' })).toMatchObject({ mode: 'detail' });
      expect(await service.answer('燃烧强吗', { groupId: 'g2' })).toMatchObject({ mode: 'simple' });
    });
  });

  describe('lookup', () => {
    test('nothing found', async () => {
      const { service } = createService();
      expect(await service.lookup('燃烧')).toBe('知识库中没有找到相关信息，请建议用户补充相关攻略文档。');
    });

    test('numbered excerpts', async () => {
      const { service } = createService();
      await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });
      expect(await service.lookup('燃烧')).toBe(`找到以下相关信息：\n\n[参考1] ${BURN_GUIDE}...`);
    });
  });

  test('getStatus combines statistics and settings', async () => {
    const { service } = createService();
    await service.ingestDocument({ name: 'burn', rawText: BURN_GUIDE, visibility: { scope: 'global' } });

    expect(await service.getStatus('g1')).toMatchObject({
      groupId: 'g1',
      defaultMode: 'simple',
      globalDocs: 1,
      globalChunks: 1,
      groupDocs: 0,
      groupChunks: 0,
      topK: 6,
      chunkSize: 800,
      overlap: 120,
    });
  });
});
