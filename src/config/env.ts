import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8765),
  MONGODB_URI: z.string().min(1, 'MONGODB_URI is required').optional(),
  ADMIN_TOKEN: z.string().min(8, 'ADMIN_TOKEN must be at least 8 chars').optional(),
  LLM_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  LLM_CHAT_MODEL: z.string().default('gpt-4o-mini'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1500),
  EMBEDDING_ENABLED: booleanFlag,
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  RERANK_ENABLED: booleanFlag,
  RERANK_API_KEY: z.string().optional(),
  RERANK_BASE_URL: z.string().url().default('https://api.jina.ai/v1'),
  RERANK_MODEL: z.string().default('jina-reranker-v2-base-multilingual'),
  GUIDE_SEARCHER: z.enum(['bm25', 'simple']).default('bm25'),
  GUIDE_TOP_K: z.coerce.number().int().positive().max(20).default(6),
  GUIDE_CHUNK_SIZE: z.coerce.number().int().positive().default(800),
  GUIDE_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(120),
  GUIDE_GROUP_BOOST: z.coerce.number().nonnegative().default(1.2),
  GUIDE_MAX_GROUP_INDEXES: z.coerce.number().int().positive().default(32),
  GUIDE_EMBEDDING_CACHE_SIZE: z.coerce.number().int().positive().default(5000),
  GUIDE_IMPORT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(60),
  GUIDE_INGEST_DIR: z.string().default('data/guides'),
});

const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
  console.error('Invalid environment variables:');
  console.error(parsedEnv.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsedEnv.data;

function requireConfig(name: string, value: string | undefined): string {
  if (!value) {
    throw new Error(`${name} is required for this operation`);
  }
  return value;
}

export function requireMongoUri(): string {
  return requireConfig('MONGODB_URI', env.MONGODB_URI);
}

export function requireLlmApiKey(): string {
  return requireConfig('LLM_API_KEY', env.LLM_API_KEY);
}
