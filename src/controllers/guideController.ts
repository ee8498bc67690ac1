import { Request, Response } from 'express';
import { z } from 'zod';
import { getGuideService } from '../services/guide';
import type { SearchHit } from '../services/guide/guideService';
import { getErrorStatus } from '../services/llm/llmClient';

const askSchema = z.object({
  question: z.string().trim().min(1).max(4000),
  groupId: z.string().trim().min(1).max(64).optional(),
  mode: z.enum(['simple', 'detail']).optional(),
  topK: z.coerce.number().int().positive().max(20).optional(),
});

function toReference(hit: SearchHit): Record<string, unknown> {
  return {
    id: hit.id,
    docId: hit.docId,
    scope: hit.scope,
    score: hit.score,
    tags: hit.tags,
    excerpt: Array.from(hit.content).slice(0, 200).join(''),
  };
}

export function sendLlmError(res: Response, error: unknown, label: string): void {
  const status = getErrorStatus(error) ?? 500;

  if (status === 401 || status === 403 || status === 402) {
    res.status(status).json({
      message: error instanceof Error ? error.message : 'LLM provider authorization error',
    });
    return;
  }

  if (status === 429) {
    res.status(429).json({ message: 'LLM rate limited, please retry later' });
    return;
  }

  console.error(`[guide] ${label} failed:`, error);
  res.status(500).json({ message: 'Guide request failed' });
}

export async function ask(req: Request, res: Response): Promise<void> {
  const parsed = askSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ message: 'Invalid payload', errors: parsed.error.flatten() });
    return;
  }

  const { question, groupId, mode, topK } = parsed.data;
  try {
    const outcome = await getGuideService().answer(question, { groupId, mode, topK });
    switch (outcome.kind) {
      case 'empty-question':
      case 'empty-knowledge-base':
        res.status(200).json({ kind: outcome.kind, answer: null, references: [] });
        return;
      case 'no-results':
        res.status(200).json({ kind: outcome.kind, mode: outcome.mode, answer: null, references: [] });
        return;
      case 'llm-unavailable':
        res.status(503).json({
          kind: outcome.kind,
          message: 'LLM is not configured',
          references: outcome.results.map(toReference),
        });
        return;
      case 'answered':
        res.status(200).json({
          kind: outcome.kind,
          mode: outcome.mode,
          answer: outcome.answer,
          references: outcome.results.map(toReference),
        });
        return;
    }
  } catch (error) {
    sendLlmError(res, error, 'ask');
  }
}
