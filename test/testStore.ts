import type {
  AliasRecord,
  ChunkFilter,
  GroupSettingsPatch,
  GroupSettingsRecord,
  GuideDocumentRecord,
  KnowledgeStats,
  KnowledgeStore,
  NewDocument,
  ScopeFilter,
} from '../src/services/guide/knowledgeStore';
import type { ChatCompleter } from '../src/services/guide/providers';
import {
  emptyEntities,
  type ChunkVisibility,
  type GuideChunk,
  type TaggedChunk,
} from '../src/services/guide/types';

function matchesFilter(item: ChunkVisibility, filter: ScopeFilter = {}): boolean {
  if (filter.scope && item.scope !== filter.scope) {
    return false;
  }
  if (filter.groupId && (item.scope !== 'group' || item.groupId !== filter.groupId)) {
    return false;
  }
  return true;
}

/** KnowledgeStore kept in plain arrays, for tests that need no database. */
export class MemoryKnowledgeStore implements KnowledgeStore {
  documents: GuideDocumentRecord[] = [];
  chunks: GuideChunk[] = [];
  aliases = new Map<string, AliasRecord>();
  settings = new Map<string, GroupSettingsRecord>();
  private nextId = 1;

  async addDocument(input: NewDocument): Promise<GuideDocumentRecord> {
    const doc: GuideDocumentRecord = {
      id: `doc-${this.nextId++}`,
      name: input.name,
      rawText: input.rawText,
      rawTextLength: Array.from(input.rawText).length,
      createdAt: new Date(0),
      ...input.visibility,
    };
    this.documents.push(doc);
    return doc;
  }

  async listDocuments(filter?: ScopeFilter): Promise<GuideDocumentRecord[]> {
    return this.documents.filter((doc) => matchesFilter(doc, filter));
  }

  async getDocument(id: string): Promise<GuideDocumentRecord | null> {
    return this.documents.find((doc) => doc.id === id) ?? null;
  }

  async deleteDocument(id: string): Promise<boolean> {
    const before = this.documents.length;
    this.documents = this.documents.filter((doc) => doc.id !== id);
    this.chunks = this.chunks.filter((chunk) => chunk.docId !== id);
    return this.documents.length < before;
  }

  async clearDocuments(filter?: ScopeFilter): Promise<number> {
    const removed = this.documents.filter((doc) => matchesFilter(doc, filter)).map((doc) => doc.id);
    this.documents = this.documents.filter((doc) => !removed.includes(doc.id));
    this.chunks = this.chunks.filter((chunk) => !removed.includes(chunk.docId));
    return removed.length;
  }

  async addChunks(docId: string, chunks: readonly TaggedChunk[], visibility: ChunkVisibility): Promise<void> {
    chunks.forEach((chunk, index) => {
      this.chunks.push({
        id: `chunk-${this.nextId++}`,
        docId,
        index,
        content: chunk.content,
        tags: [...chunk.tags],
        entities: { ...emptyEntities(), ...chunk.entities },
        ...visibility,
      });
    });
  }

  async listChunks(filter: ChunkFilter = {}): Promise<GuideChunk[]> {
    return this.chunks.filter((chunk) => matchesFilter(chunk, filter) && (!filter.docId || chunk.docId === filter.docId));
  }

  async getChunksForSearch(groupId?: string): Promise<GuideChunk[]> {
    const global = this.chunks.filter((chunk) => chunk.scope === 'global');
    const group = groupId ? this.chunks.filter((chunk) => chunk.scope === 'group' && chunk.groupId === groupId) : [];
    return [...global, ...group];
  }

  async countChunks(filter?: ScopeFilter): Promise<number> {
    return this.chunks.filter((chunk) => matchesFilter(chunk, filter)).length;
  }

  async upsertAlias(alias: string, canonical: string, type = 'other'): Promise<AliasRecord> {
    const key = alias.trim().toLowerCase();
    const record: AliasRecord = { alias: key, canonical: canonical.trim(), type, createdAt: new Date(0) };
    this.aliases.set(key, record);
    return record;
  }

  async listAliases(): Promise<AliasRecord[]> {
    return [...this.aliases.values()].sort((a, b) => (a.alias < b.alias ? -1 : 1));
  }

  async getAliasMap(): Promise<Map<string, string>> {
    return new Map([...this.aliases.values()].map((item) => [item.alias, item.canonical]));
  }

  async deleteAlias(alias: string): Promise<boolean> {
    return this.aliases.delete(alias.trim().toLowerCase());
  }

  async getGroupSettings(groupId: string): Promise<GroupSettingsRecord> {
    const existing = this.settings.get(groupId);
    if (existing) {
      return existing;
    }
    const created: GroupSettingsRecord = { groupId, defaultMode: 'simple' };
    this.settings.set(groupId, created);
    return created;
  }

  async updateGroupSettings(groupId: string, patch: GroupSettingsPatch): Promise<GroupSettingsRecord> {
    const current = await this.getGroupSettings(groupId);
    const updated: GroupSettingsRecord = {
      ...current,
      ...(patch.defaultMode ? { defaultMode: patch.defaultMode } : {}),
      ...(patch.lastImportAt ? { lastImportAt: patch.lastImportAt } : {}),
    };
    this.settings.set(groupId, updated);
    return updated;
  }

  async getStats(groupId?: string): Promise<KnowledgeStats> {
    const globalDocs = this.documents.filter((doc) => doc.scope === 'global').length;
    const globalChunks = this.chunks.filter((chunk) => chunk.scope === 'global').length;
    const groupDocs = groupId ? (await this.listDocuments({ scope: 'group', groupId })).length : 0;
    const groupChunks = groupId ? (await this.countChunks({ scope: 'group', groupId })) : 0;
    return {
      global: { docCount: globalDocs, chunkCount: globalChunks },
      group: { docCount: groupDocs, chunkCount: groupChunks },
      total: { docCount: globalDocs + groupDocs, chunkCount: globalChunks + groupChunks },
    };
  }

  async listGroupIds(): Promise<string[]> {
    const ids = new Set<string>();
    for (const doc of this.documents) {
      if (doc.scope === 'group') {
        ids.add(doc.groupId);
      }
    }
    return [...ids].sort();
  }
}

/** Records every prompt pair and answers with a fixed text. */
export class FakeChatCompleter implements ChatCompleter {
  readonly available = true;
  calls: Array<{ systemPrompt: string; userPrompt: string }> = [];

  constructor(private readonly reply = 'test answer') {}

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    this.calls.push({ systemPrompt, userPrompt });
    return this.reply;
  }
}

let chunkCounter = 0;

export function makeChunk(
  content: string,
  options: { tags?: string[]; groupId?: string; id?: string } = {}
): GuideChunk {
  chunkCounter += 1;
  const base = {
    id: options.id ?? `c${chunkCounter}`,
    docId: 'doc',
    index: chunkCounter,
    content,
    tags: options.tags ?? [],
    entities: emptyEntities(),
  };
  return options.groupId ? { ...base, scope: 'group', groupId: options.groupId } : { ...base, scope: 'global' };
}
