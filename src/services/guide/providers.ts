export interface EmbeddingProvider {
  /** False for the disabled variant; decides the over-fetch size. */
  readonly enabled: boolean;
  getEmbedding(text: string): Promise<number[]>;
  getEmbeddings(texts: string[]): Promise<number[][]>;
}

export interface RerankRequest {
  query: string;
  documents: string[];
  topN: number;
}

export interface RerankItem {
  /** Position of the document in the request. */
  index: number;
  relevanceScore: number;
}

export interface RerankProvider {
  readonly enabled: boolean;
  /** Results ordered by relevance, most relevant first. */
  rerank(request: RerankRequest): Promise<RerankItem[]>;
}

export interface ChatCompleter {
  readonly available: boolean;
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export class ProviderUnavailableError extends Error {
  constructor(provider: string) {
    super(`${provider} provider is not configured`);
    this.name = 'ProviderUnavailableError';
  }
}

export class DisabledEmbeddingProvider implements EmbeddingProvider {
  readonly enabled = false;

  async getEmbedding(): Promise<number[]> {
    throw new ProviderUnavailableError('embedding');
  }

  async getEmbeddings(): Promise<number[][]> {
    throw new ProviderUnavailableError('embedding');
  }
}

export class DisabledRerankProvider implements RerankProvider {
  readonly enabled = false;

  async rerank(): Promise<RerankItem[]> {
    throw new ProviderUnavailableError('rerank');
  }
}

export class UnavailableChatCompleter implements ChatCompleter {
  readonly available = false;

  async complete(): Promise<string> {
    throw new ProviderUnavailableError('chat');
  }
}
