import { Types, type FilterQuery } from 'mongoose';
import { GroupSettings } from '../../models/GroupSettings';
import { GuideAlias } from '../../models/GuideAlias';
import { GuideChunk as GuideChunkModel, type GuideChunkDocument } from '../../models/GuideChunk';
import { GuideDocument, type GuideDocumentDocument } from '../../models/GuideDocument';
import {
  toVisibility,
  type AliasRecord,
  type ChunkFilter,
  type GroupSettingsPatch,
  type GroupSettingsRecord,
  type GuideDocumentRecord,
  type KnowledgeStats,
  type KnowledgeStore,
  type NewDocument,
  type ScopeFilter,
} from './knowledgeStore';
import type { AnswerMode } from './prompts';
import {
  emptyEntities,
  type ChunkEntities,
  type ChunkScope,
  type ChunkVisibility,
  type GuideChunk,
  type TaggedChunk,
} from './types';

type LeanDocument = {
  _id: Types.ObjectId;
  name: string;
  scope: ChunkScope;
  groupId?: string | null;
  rawText: string;
  rawTextLength: number;
  createdAt: Date;
};

type LeanChunk = {
  _id: Types.ObjectId;
  docId: Types.ObjectId;
  scope: ChunkScope;
  groupId?: string | null;
  chunkIndex: number;
  content: string;
  tags?: string[];
  entities?: Partial<ChunkEntities>;
};

type LeanAlias = {
  alias: string;
  canonical: string;
  type?: string;
  createdAt: Date;
};

type LeanGroupSettings = {
  groupId: string;
  defaultMode?: AnswerMode;
  lastImportAt?: Date | null;
};

function toDocumentRecord(doc: LeanDocument): GuideDocumentRecord {
  return {
    id: String(doc._id),
    name: doc.name,
    rawText: doc.rawText,
    rawTextLength: doc.rawTextLength,
    createdAt: doc.createdAt,
    ...toVisibility(doc.scope, doc.groupId),
  };
}

function toChunk(chunk: LeanChunk): GuideChunk {
  return {
    id: String(chunk._id),
    docId: String(chunk.docId),
    index: chunk.chunkIndex,
    content: chunk.content,
    tags: chunk.tags ?? [],
    entities: { ...emptyEntities(), ...chunk.entities },
    ...toVisibility(chunk.scope, chunk.groupId),
  };
}

function toAliasRecord(alias: LeanAlias): AliasRecord {
  return {
    alias: alias.alias,
    canonical: alias.canonical,
    type: alias.type ?? 'other',
    createdAt: alias.createdAt,
  };
}

function toSettingsRecord(settings: LeanGroupSettings): GroupSettingsRecord {
  return {
    groupId: settings.groupId,
    defaultMode: settings.defaultMode ?? 'simple',
    lastImportAt: settings.lastImportAt ?? undefined,
  };
}

function scopeQuery(filter: ScopeFilter = {}): { scope?: ChunkScope; groupId?: string } {
  const query: { scope?: ChunkScope; groupId?: string } = {};
  if (filter.scope) {
    query.scope = filter.scope;
  }
  if (filter.groupId) {
    query.groupId = filter.groupId;
  }
  return query;
}

function visibilityFields(visibility: ChunkVisibility): { scope: ChunkScope; groupId?: string } {
  return visibility.scope === 'group' ? { scope: 'group', groupId: visibility.groupId } : { scope: 'global' };
}

export class MongoKnowledgeStore implements KnowledgeStore {
  async addDocument(input: NewDocument): Promise<GuideDocumentRecord> {
    const created = await GuideDocument.create({
      name: input.name,
      rawText: input.rawText,
      rawTextLength: Array.from(input.rawText).length,
      ...visibilityFields(input.visibility),
    });
    return {
      id: String(created._id),
      name: created.name,
      rawText: created.rawText,
      rawTextLength: created.rawTextLength,
      createdAt: created.createdAt,
      ...input.visibility,
    };
  }

  async listDocuments(filter?: ScopeFilter): Promise<GuideDocumentRecord[]> {
    const query: FilterQuery<GuideDocumentDocument> = scopeQuery(filter);
    const docs = await GuideDocument.find(query).sort({ createdAt: -1 }).lean<LeanDocument[]>();
    return docs.map(toDocumentRecord);
  }

  async getDocument(id: string): Promise<GuideDocumentRecord | null> {
    if (!Types.ObjectId.isValid(id)) {
      return null;
    }
    const doc = await GuideDocument.findById(id).lean<LeanDocument>();
    return doc ? toDocumentRecord(doc) : null;
  }

  async deleteDocument(id: string): Promise<boolean> {
    if (!Types.ObjectId.isValid(id)) {
      return false;
    }
    const docId = new Types.ObjectId(id);
    await GuideChunkModel.deleteMany({ docId });
    const result = await GuideDocument.deleteOne({ _id: docId });
    return result.deletedCount > 0;
  }

  async clearDocuments(filter?: ScopeFilter): Promise<number> {
    const query: FilterQuery<GuideDocumentDocument> = scopeQuery(filter);
    const docs = await GuideDocument.find(query, { _id: 1 }).lean<Array<{ _id: Types.ObjectId }>>();
    if (docs.length === 0) {
      return 0;
    }

    const ids = docs.map((doc) => doc._id);
    await GuideChunkModel.deleteMany({ docId: { $in: ids } });
    const result = await GuideDocument.deleteMany({ _id: { $in: ids } });
    return result.deletedCount;
  }

  async addChunks(docId: string, chunks: readonly TaggedChunk[], visibility: ChunkVisibility): Promise<void> {
    if (chunks.length === 0) {
      return;
    }
    const parentId = new Types.ObjectId(docId);
    await GuideChunkModel.insertMany(
      chunks.map((chunk, index) => ({
        docId: parentId,
        chunkIndex: index,
        content: chunk.content,
        tags: chunk.tags,
        entities: chunk.entities,
        ...visibilityFields(visibility),
      })),
      { ordered: true }
    );
  }

  async listChunks(filter: ChunkFilter = {}): Promise<GuideChunk[]> {
    const query: FilterQuery<GuideChunkDocument> = scopeQuery(filter);
    if (filter.docId) {
      if (!Types.ObjectId.isValid(filter.docId)) {
        return [];
      }
      query.docId = new Types.ObjectId(filter.docId);
    }
    const chunks = await GuideChunkModel.find(query).sort({ docId: 1, chunkIndex: 1 }).lean<LeanChunk[]>();
    return chunks.map(toChunk);
  }

  async getChunksForSearch(groupId?: string): Promise<GuideChunk[]> {
    const globalChunks = await GuideChunkModel.find({ scope: 'global' })
      .sort({ docId: 1, chunkIndex: 1 })
      .lean<LeanChunk[]>();
    const groupChunks = groupId
      ? await GuideChunkModel.find({ scope: 'group', groupId }).sort({ docId: 1, chunkIndex: 1 }).lean<LeanChunk[]>()
      : [];
    return [...globalChunks, ...groupChunks].map(toChunk);
  }

  async countChunks(filter?: ScopeFilter): Promise<number> {
    const query: FilterQuery<GuideChunkDocument> = scopeQuery(filter);
    return GuideChunkModel.countDocuments(query);
  }

  async upsertAlias(alias: string, canonical: string, type = 'other'): Promise<AliasRecord> {
    const saved = await GuideAlias.findOneAndUpdate(
      { alias: alias.trim().toLowerCase() },
      { $set: { canonical: canonical.trim(), type } },
      { upsert: true, new: true, setDefaultsOnInsert: true }
    ).lean<LeanAlias>();
    if (!saved) {
      throw new Error(`Failed to save alias "${alias}"`);
    }
    return toAliasRecord(saved);
  }

  async listAliases(): Promise<AliasRecord[]> {
    const aliases = await GuideAlias.find().sort({ alias: 1 }).lean<LeanAlias[]>();
    return aliases.map(toAliasRecord);
  }

  async getAliasMap(): Promise<Map<string, string>> {
    const aliases = await this.listAliases();
    return new Map(aliases.map((item) => [item.alias, item.canonical]));
  }

  async deleteAlias(alias: string): Promise<boolean> {
    const result = await GuideAlias.deleteOne({ alias: alias.trim().toLowerCase() });
    return result.deletedCount > 0;
  }

  async getGroupSettings(groupId: string): Promise<GroupSettingsRecord> {
    const settings = await GroupSettings.findOneAndUpdate(
      { groupId },
      { $setOnInsert: { groupId } },
      { upsert: true, new: true, setDefaultsOnInsert: true }
    ).lean<LeanGroupSettings>();
    return settings ? toSettingsRecord(settings) : { groupId, defaultMode: 'simple' };
  }

  async updateGroupSettings(groupId: string, patch: GroupSettingsPatch): Promise<GroupSettingsRecord> {
    const update: GroupSettingsPatch = {};
    if (patch.defaultMode) {
      update.defaultMode = patch.defaultMode;
    }
    if (patch.lastImportAt) {
      update.lastImportAt = patch.lastImportAt;
    }

    const settings = await GroupSettings.findOneAndUpdate(
      { groupId },
      { $set: update, $setOnInsert: { groupId } },
      { upsert: true, new: true, setDefaultsOnInsert: true }
    ).lean<LeanGroupSettings>();
    return settings ? toSettingsRecord(settings) : { groupId, defaultMode: update.defaultMode ?? 'simple' };
  }

  async getStats(groupId?: string): Promise<KnowledgeStats> {
    const [globalDocs, globalChunks] = await Promise.all([
      GuideDocument.countDocuments({ scope: 'global' }),
      GuideChunkModel.countDocuments({ scope: 'global' }),
    ]);
    const [groupDocs, groupChunks] = groupId
      ? await Promise.all([
          GuideDocument.countDocuments({ scope: 'group', groupId }),
          GuideChunkModel.countDocuments({ scope: 'group', groupId }),
        ])
      : [0, 0];

    return {
      global: { docCount: globalDocs, chunkCount: globalChunks },
      group: { docCount: groupDocs, chunkCount: groupChunks },
      total: { docCount: globalDocs + groupDocs, chunkCount: globalChunks + groupChunks },
    };
  }

  async listGroupIds(): Promise<string[]> {
    const ids: unknown[] = await GuideDocument.distinct('groupId', { groupId: { $ne: null } });
    return ids.filter((id): id is string => typeof id === 'string' && id.length > 0).sort();
  }
}
