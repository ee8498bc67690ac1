import { env } from '../../config/env';
import { createRerankProvider } from '../llm/jinaRerankProvider';
import { createChatCompleter, createEmbeddingProvider } from '../llm/openaiProviders';
import { CachedEmbeddingProvider } from './cachedEmbeddingProvider';
import { Chunker } from './chunker';
import { GuideBot } from './guideBot';
import { GuideService, type GuideSearchEngine } from './guideService';
import { MongoKnowledgeStore } from './mongoKnowledgeStore';
import { Searcher } from './searcher';
import { SimpleSearcher } from './simpleSearcher';

let guideService: GuideService | null = null;
let guideBot: GuideBot | null = null;

function createSearcherFactory(): () => GuideSearchEngine {
  if (env.GUIDE_SEARCHER === 'simple') {
    return () => new SimpleSearcher();
  }

  const baseEmbeddingProvider = createEmbeddingProvider();
  // One cache across every group's searcher, so shared global chunks are embedded once.
  const embeddingProvider = baseEmbeddingProvider.enabled
    ? new CachedEmbeddingProvider(baseEmbeddingProvider, env.GUIDE_EMBEDDING_CACHE_SIZE)
    : baseEmbeddingProvider;
  const rerankProvider = createRerankProvider();
  console.log(
    `[guide] bm25 searcher (embedding=${embeddingProvider.enabled ? 'on' : 'off'}, rerank=${
      rerankProvider.enabled ? 'on' : 'off'
    })`
  );
  return () =>
    new Searcher({
      embeddingProvider,
      rerankProvider,
      weights: { groupBoost: env.GUIDE_GROUP_BOOST },
    });
}

export function getGuideService(): GuideService {
  if (!guideService) {
    guideService = new GuideService({
      store: new MongoKnowledgeStore(),
      createSearcher: createSearcherFactory(),
      chunker: new Chunker({ chunkSize: env.GUIDE_CHUNK_SIZE, overlap: env.GUIDE_CHUNK_OVERLAP }),
      llm: createChatCompleter(),
      topK: env.GUIDE_TOP_K,
      maxCachedSearchers: env.GUIDE_MAX_GROUP_INDEXES,
    });
  }
  return guideService;
}

export function getGuideBot(): GuideBot {
  if (!guideBot) {
    guideBot = new GuideBot(getGuideService(), { importTimeoutSeconds: env.GUIDE_IMPORT_TIMEOUT_SECONDS });
  }
  return guideBot;
}
