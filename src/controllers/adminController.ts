import { Request, Response } from 'express';
import { z } from 'zod';
import { getGuideService } from '../services/guide';
import type { GuideDocumentRecord } from '../services/guide/knowledgeStore';
import { getTagStatistics } from '../services/guide/tagger';

const scopeSchema = z.enum(['global', 'group']);

const scopeFilterSchema = z.object({
  scope: scopeSchema.optional(),
  groupId: z.string().trim().min(1).max(64).optional(),
});

const chunkFilterSchema = scopeFilterSchema.extend({
  docId: z.string().trim().min(1).optional(),
});

const createDocumentSchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    text: z.string().min(1).max(2_000_000),
    scope: scopeSchema.default('global'),
    groupId: z.string().trim().min(1).max(64).optional(),
  })
  .refine((data) => data.scope === 'global' || Boolean(data.groupId), {
    message: 'groupId is required for group scope',
    path: ['groupId'],
  });

const searchSchema = z.object({
  query: z.string().trim().min(1).max(1000),
  groupId: z.string().trim().min(1).max(64).optional(),
  topK: z.coerce.number().int().positive().max(50).optional(),
});

const aliasSchema = z.object({
  alias: z.string().trim().min(1).max(100),
  canonical: z.string().trim().min(1).max(100),
  type: z.string().trim().min(1).max(32).optional(),
});

const statsQuerySchema = z.object({
  groupId: z.string().trim().min(1).max(64).optional(),
});

function toDocumentSummary(doc: GuideDocumentRecord): Record<string, unknown> {
  return {
    id: doc.id,
    name: doc.name,
    scope: doc.scope,
    groupId: doc.scope === 'group' ? doc.groupId : null,
    rawTextLength: doc.rawTextLength,
    createdAt: doc.createdAt.toISOString(),
  };
}

export async function listDocuments(req: Request, res: Response): Promise<void> {
  const parsed = scopeFilterSchema.safeParse(req.query);
  if (!parsed.success) {
    res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
    return;
  }

  const docs = await getGuideService().store.listDocuments(parsed.data);
  res.status(200).json({ documents: docs.map(toDocumentSummary) });
}

export async function createDocument(req: Request, res: Response): Promise<void> {
  const parsed = createDocumentSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
    return;
  }

  const { name, text, scope, groupId } = parsed.data;
  const result = await getGuideService().ingestDocument({
    name,
    rawText: text,
    visibility: scope === 'group' && groupId ? { scope, groupId } : { scope: 'global' },
  });
  if (!result) {
    res.status(400).json({ message: 'Document text is empty' });
    return;
  }

  res.status(201).json({
    document: toDocumentSummary(result.document),
    chunkCount: result.chunkCount,
    charCount: result.charCount,
    tagStats: result.tagStats,
  });
}

export async function deleteDocument(req: Request, res: Response): Promise<void> {
  const deleted = await getGuideService().deleteDocument(req.params.id);
  if (!deleted) {
    res.status(404).json({ message: 'Document not found' });
    return;
  }
  res.status(204).send();
}

export async function clearDocuments(req: Request, res: Response): Promise<void> {
  const parsed = scopeFilterSchema.safeParse(req.query);
  if (!parsed.success) {
    res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
    return;
  }

  const removed = await getGuideService().clearDocuments(parsed.data);
  res.status(200).json({ removed });
}

export async function listChunks(req: Request, res: Response): Promise<void> {
  const parsed = chunkFilterSchema.safeParse(req.query);
  if (!parsed.success) {
    res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
    return;
  }

  const chunks = await getGuideService().store.listChunks(parsed.data);
  res.status(200).json({ chunks, tagStats: getTagStatistics(chunks) });
}

export async function debugSearch(req: Request, res: Response): Promise<void> {
  const parsed = searchSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
    return;
  }

  const { query, groupId, topK } = parsed.data;
  const result = await getGuideService().searchDebug(query, { groupId, topK });
  res.status(200).json(result);
}

export async function listAliases(_req: Request, res: Response): Promise<void> {
  const aliases = await getGuideService().store.listAliases();
  res.status(200).json({ aliases });
}

export async function upsertAlias(req: Request, res: Response): Promise<void> {
  const parsed = aliasSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
    return;
  }

  const { alias, canonical, type } = parsed.data;
  const saved = await getGuideService().upsertAlias(alias, canonical, type);
  res.status(200).json({ alias: saved });
}

export async function deleteAlias(req: Request, res: Response): Promise<void> {
  const deleted = await getGuideService().deleteAlias(req.params.alias);
  if (!deleted) {
    res.status(404).json({ message: 'Alias not found' });
    return;
  }
  res.status(204).send();
}

export async function getStats(req: Request, res: Response): Promise<void> {
  const parsed = statsQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
    return;
  }

  const store = getGuideService().store;
  const [stats, groupIds] = await Promise.all([store.getStats(parsed.data.groupId), store.listGroupIds()]);
  res.status(200).json({ ...stats, groupIds });
}
