import { z } from 'zod';
import { env } from '../../config/env';
import {
  DisabledRerankProvider,
  type RerankItem,
  type RerankProvider,
  type RerankRequest,
} from '../guide/providers';
import { withRetry } from './llmClient';

export interface JinaRerankOptions {
  apiKey: string;
  baseUrl?: string;
  modelId?: string;
}

const rerankResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      relevance_score: z.number(),
    })
  ),
});

class RerankHttpError extends Error {
  constructor(
    readonly status: number,
    body: string
  ) {
    super(`Rerank API error: ${status} ${body}`);
    this.name = 'RerankHttpError';
  }
}

/**
 * Jina-compatible `/rerank` endpoint (Cohere and most self-hosted rerankers
 * accept the same request shape).
 */
export class JinaRerankProvider implements RerankProvider {
  readonly enabled = true;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly modelId: string;

  constructor(options: JinaRerankOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.jina.ai/v1').replace(/\/+$/, '');
    this.modelId = options.modelId ?? 'jina-reranker-v2-base-multilingual';
  }

  async rerank(request: RerankRequest): Promise<RerankItem[]> {
    const data = await withRetry(async () => {
      const response = await fetch(`${this.baseUrl}/rerank`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.modelId,
          query: request.query,
          documents: request.documents,
          top_n: request.topN,
        }),
      });

      if (!response.ok) {
        throw new RerankHttpError(response.status, await response.text());
      }
      return rerankResponseSchema.parse(await response.json());
    }, { label: 'rerank' });

    return data.results.map((item) => ({ index: item.index, relevanceScore: item.relevance_score }));
  }
}

export function createRerankProvider(): RerankProvider {
  if (env.RERANK_ENABLED && env.RERANK_API_KEY) {
    return new JinaRerankProvider({
      apiKey: env.RERANK_API_KEY,
      baseUrl: env.RERANK_BASE_URL,
      modelId: env.RERANK_MODEL,
    });
  }
  return new DisabledRerankProvider();
}
