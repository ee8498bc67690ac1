import type { AnswerMode } from './prompts';
import type { ChunkScope, ChunkVisibility, GuideChunk, TaggedChunk } from './types';

export type GuideDocumentRecord = {
  id: string;
  name: string;
  rawText: string;
  rawTextLength: number;
  createdAt: Date;
} & ChunkVisibility;

export interface ScopeFilter {
  scope?: ChunkScope;
  groupId?: string;
}

export interface ChunkFilter extends ScopeFilter {
  docId?: string;
}

export interface AliasRecord {
  alias: string;
  canonical: string;
  type: string;
  createdAt: Date;
}

export interface GroupSettingsRecord {
  groupId: string;
  defaultMode: AnswerMode;
  lastImportAt?: Date;
}

export type GroupSettingsPatch = Partial<Pick<GroupSettingsRecord, 'defaultMode' | 'lastImportAt'>>;

export interface ScopeCounts {
  docCount: number;
  chunkCount: number;
}

export interface KnowledgeStats {
  global: ScopeCounts;
  group: ScopeCounts;
  total: ScopeCounts;
}

export interface NewDocument {
  name: string;
  rawText: string;
  visibility: ChunkVisibility;
}

/**
 * Persistence used by the guide service. Deleting a document removes its
 * chunks; chunk sets are only ever written whole for a new document.
 */
export interface KnowledgeStore {
  addDocument(input: NewDocument): Promise<GuideDocumentRecord>;
  listDocuments(filter?: ScopeFilter): Promise<GuideDocumentRecord[]>;
  getDocument(id: string): Promise<GuideDocumentRecord | null>;
  deleteDocument(id: string): Promise<boolean>;
  /** Removes matching documents and their chunks; returns the number of documents removed. */
  clearDocuments(filter?: ScopeFilter): Promise<number>;

  addChunks(docId: string, chunks: readonly TaggedChunk[], visibility: ChunkVisibility): Promise<void>;
  listChunks(filter?: ChunkFilter): Promise<GuideChunk[]>;
  /** Global chunks plus, when `groupId` is given, that group's own chunks. */
  getChunksForSearch(groupId?: string): Promise<GuideChunk[]>;
  countChunks(filter?: ScopeFilter): Promise<number>;

  upsertAlias(alias: string, canonical: string, type?: string): Promise<AliasRecord>;
  listAliases(): Promise<AliasRecord[]>;
  getAliasMap(): Promise<Map<string, string>>;
  deleteAlias(alias: string): Promise<boolean>;

  getGroupSettings(groupId: string): Promise<GroupSettingsRecord>;
  updateGroupSettings(groupId: string, patch: GroupSettingsPatch): Promise<GroupSettingsRecord>;

  getStats(groupId?: string): Promise<KnowledgeStats>;
  listGroupIds(): Promise<string[]>;
}

export function toVisibility(scope: ChunkScope, groupId: string | undefined | null): ChunkVisibility {
  if (scope === 'group') {
    if (!groupId) {
      throw new Error('groupId is required for group scope');
    }
    return { scope, groupId };
  }
  return { scope };
}
