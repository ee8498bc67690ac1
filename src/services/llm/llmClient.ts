import OpenAI from 'openai';
import { env, requireLlmApiKey } from '../../config/env';

const REQUEST_TIMEOUT_MS = 120_000;

let cachedClient: OpenAI | null = null;

/** Built on first use, so a missing key only fails the call that needs it. */
export function getLlmClient(): OpenAI {
  if (!cachedClient) {
    cachedClient = new OpenAI({
      apiKey: requireLlmApiKey(),
      baseURL: env.LLM_BASE_URL,
      timeout: REQUEST_TIMEOUT_MS,
    });
  }
  return cachedClient;
}

export function isLlmConfigured(): boolean {
  return Boolean(env.LLM_API_KEY);
}

export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' ? status : undefined;
}

export interface RetryOptions {
  /** Log prefix for retry warnings. */
  label?: string;
  maxRetries?: number;
  baseDelayMs?: number;
}

/** Retries 429 and 5xx responses with exponential backoff; anything else is thrown at once. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { label = 'llm', maxRetries = 3, baseDelayMs = 1000 } = options;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      const status = getErrorStatus(error);
      const retryable = status !== undefined && (status === 429 || status >= 500);
      if (!retryable || attempt > maxRetries) {
        throw error;
      }
      const delayMs = baseDelayMs * 2 ** (attempt - 1);
      console.warn(`[${label}] status ${status}, retry ${attempt}/${maxRetries} in ${delayMs}ms`);
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
    }
  }
}
