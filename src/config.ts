/**
 * Process configuration
 *
 * Reads the environment once at start-up. Every value has a default so a
 * local Ollama setup works without a `.env` file; OpenRouter needs an API key.
 */

import { z } from 'zod';
import { ConfigurationError } from './utils/error-handler.js';

export type LLMProvider = 'openrouter' | 'ollama' | 'lmstudio';
export type GraphStoreKind = 'memory' | 'jsonl' | 'neo4j';

const DEFAULT_BASE_URLS: Record<LLMProvider, string> = {
  openrouter: 'https://openrouter.ai/api/v1',
  ollama: 'http://localhost:11434/v1',
  lmstudio: 'http://localhost:1234/v1'
};

const envSchema = z.object({
  LLM_PROVIDER: z.enum(['openrouter', 'ollama', 'lmstudio']).default('ollama'),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().min(1).default('llama3.1:8b'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  EMBEDDING_BASE_URL: z.string().url().optional(),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().min(1).default('all-minilm'),
  EMBEDDING_CACHE_SIZE: z.coerce.number().int().nonnegative().default(10000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  CHUNK_MAX_CHARS: z.coerce.number().int().positive().default(6000),
  VECTOR_TOP_K: z.coerce.number().int().positive().default(5),
  GRAPH_STORE: z.enum(['memory', 'jsonl', 'neo4j']).default('jsonl'),
  DATA_DIR: z.string().min(1).default('./data'),
  NEO4J_URI: z.string().default('bolt://localhost:7687'),
  NEO4J_USERNAME: z.string().default('neo4j'),
  NEO4J_PASSWORD: z.string().default('neo4j'),
  NEO4J_DATABASE: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().default('127.0.0.1')
});

export interface ModelEndpointConfig {
  baseURL: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface AppConfig {
  completion: ModelEndpointConfig & {
    provider: LLMProvider;
    temperature: number;
    maxTokens: number;
  };
  embedding: ModelEndpointConfig & {
    cacheSize: number;
  };
  ingestion: {
    maxChars: number;
    retryBaseDelayMs: number;
  };
  retrieval: {
    topK: number;
  };
  store: {
    kind: GraphStoreKind;
    dataDir: string;
    neo4j: {
      uri: string;
      username: string;
      password: string;
      database?: string;
    };
  };
  server: {
    port: number;
    host: string;
  };
}

/**
 * Validate environment variables and build the application config
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  const baseURL = values.LLM_BASE_URL ?? DEFAULT_BASE_URLS[values.LLM_PROVIDER];

  // Local runtimes ignore the key but the client refuses to start without one
  const apiKey = values.LLM_API_KEY || (values.LLM_PROVIDER === 'openrouter' ? '' : values.LLM_PROVIDER);
  if (!apiKey) {
    throw new ConfigurationError('LLM_API_KEY is required when LLM_PROVIDER is openrouter');
  }

  return {
    completion: {
      provider: values.LLM_PROVIDER,
      baseURL,
      apiKey,
      model: values.LLM_MODEL,
      temperature: values.LLM_TEMPERATURE,
      maxTokens: values.LLM_MAX_TOKENS,
      timeoutMs: values.REQUEST_TIMEOUT_MS,
      maxRetries: values.MAX_RETRIES
    },
    embedding: {
      baseURL: values.EMBEDDING_BASE_URL ?? baseURL,
      apiKey: values.EMBEDDING_API_KEY || apiKey,
      model: values.EMBEDDING_MODEL,
      cacheSize: values.EMBEDDING_CACHE_SIZE,
      timeoutMs: values.REQUEST_TIMEOUT_MS,
      maxRetries: values.MAX_RETRIES
    },
    ingestion: {
      maxChars: values.CHUNK_MAX_CHARS,
      retryBaseDelayMs: values.RETRY_BASE_DELAY_MS
    },
    retrieval: {
      topK: values.VECTOR_TOP_K
    },
    store: {
      kind: values.GRAPH_STORE,
      dataDir: values.DATA_DIR,
      neo4j: {
        uri: values.NEO4J_URI,
        username: values.NEO4J_USERNAME,
        password: values.NEO4J_PASSWORD,
        database: values.NEO4J_DATABASE
      }
    },
    server: {
      port: values.PORT,
      host: values.HOST
    }
  };
}
