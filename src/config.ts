/**
 * Configuration constants
 * Only the composition root (index.ts) reads these; services take explicit options.
 */

import { config } from 'dotenv';

// Load environment variables before reading them
config();

const embeddingProvider: 'hashing' | 'openai' = process.env.EMBEDDING_PROVIDER === 'openai' ? 'openai' : 'hashing';

export const CONFIG = {
  COMPLETION_API_KEY: process.env.COMPLETION_API_KEY || '',
  COMPLETION_BASE_URL: process.env.COMPLETION_BASE_URL || 'https://api.perplexity.ai',
  COMPLETION_MODEL: process.env.COMPLETION_MODEL || 'sonar-pro',
  COMPLETION_TEMPERATURE: parseFloat(process.env.COMPLETION_TEMPERATURE || '0.3'),

  // Embedding provider: 'hashing' works offline, 'openai' calls an embeddings endpoint
  EMBEDDING_PROVIDER: embeddingProvider,
  EMBEDDING_API_KEY: process.env.EMBEDDING_API_KEY || '',
  EMBEDDING_BASE_URL: process.env.EMBEDDING_BASE_URL || undefined,
  EMBEDDING_MODEL: process.env.EMBEDDING_MODEL || 'text-embedding-3-small',
  EMBEDDING_DIMENSIONS: parseInt(process.env.EMBEDDING_DIMENSIONS || '256', 10),

  MAX_TOKENS: parseInt(process.env.MAX_TOKENS || '3000', 10),
  SUMMARY_MAX_TOKENS_PCT: parseInt(process.env.SUMMARY_MAX_TOKENS_PCT || '33', 10),

  // Minimum number of recent turns kept verbatim during compaction
  MIN_RECENT_MESSAGES: parseInt(process.env.MIN_RECENT_MESSAGES || '1', 10),

  TOP_K_RETRIEVAL: parseInt(process.env.TOP_K_RETRIEVAL || '3', 10),
  STORE_PATH: process.env.STORE_PATH || './chat_store',
  STORE_COLLECTION: process.env.STORE_COLLECTION || 'chat_history',
  SESSION_ID: process.env.SESSION_ID || undefined,

  DISPATCH_TIMEOUT_MS: parseInt(process.env.DISPATCH_TIMEOUT_MS || '30000', 10),
  COMPACTION_TIMEOUT_MS: parseInt(process.env.COMPACTION_TIMEOUT_MS || '10000', 10)
} as const;
