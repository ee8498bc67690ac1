import { env } from '../../config/env';
import {
  DisabledEmbeddingProvider,
  UnavailableChatCompleter,
  type ChatCompleter,
  type EmbeddingProvider,
} from '../guide/providers';
import { getLlmClient, isLlmConfigured, withRetry } from './llmClient';

const EMBEDDING_BATCH_SIZE = 32;

async function embedBatch(inputs: string[]): Promise<number[][]> {
  if (inputs.length === 0) {
    return [];
  }
  const response = await withRetry(
    () => getLlmClient().embeddings.create({ model: env.EMBEDDING_MODEL, input: inputs }),
    { label: 'llm:embedding' }
  );
  return response.data.map((item) => item.embedding);
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly enabled = true;

  async getEmbedding(text: string): Promise<number[]> {
    const [vector] = await embedBatch([text]);
    if (!vector) {
      throw new Error('Embedding response is empty');
    }
    return vector;
  }

  async getEmbeddings(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(i, i + EMBEDDING_BATCH_SIZE);
      const batchVectors = await embedBatch(batch);
      if (batchVectors.length !== batch.length) {
        throw new Error(`Embedding response size mismatch: expected ${batch.length}, got ${batchVectors.length}`);
      }
      vectors.push(...batchVectors);
    }
    return vectors;
  }
}

export class OpenAIChatCompleter implements ChatCompleter {
  readonly available = true;

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const completion = await withRetry(
      () =>
        getLlmClient().chat.completions.create({
          model: env.LLM_CHAT_MODEL,
          temperature: env.LLM_TEMPERATURE,
          max_tokens: env.LLM_MAX_TOKENS,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
        }),
      { label: 'llm:chat' }
    );
    return completion.choices[0]?.message?.content?.trim() ?? '';
  }
}

export function createEmbeddingProvider(): EmbeddingProvider {
  if (env.EMBEDDING_ENABLED && isLlmConfigured()) {
    return new OpenAIEmbeddingProvider();
  }
  return new DisabledEmbeddingProvider();
}

export function createChatCompleter(): ChatCompleter {
  return isLlmConfigured() ? new OpenAIChatCompleter() : new UnavailableChatCompleter();
}
