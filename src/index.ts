#!/usr/bin/env node
/**
 * Context-aware chat loop
 * Wires the memory buffer, vector store and entity tracker into one assembler
 */

import * as readline from 'readline';
import { CONFIG } from './config.js';
import { ProviderError, describeError } from './errors.js';
import { logger } from './logger.js';
import { ContextAssembler } from './services/context-assembler.js';
import { OpenAICompletionProvider } from './services/completion-provider.js';
import { HashingEmbeddingProvider, OpenAIEmbeddingProvider } from './services/embedding-provider.js';
import { EntityStateTracker } from './services/entity-tracker.js';
import { SummaryMemoryBuffer } from './services/memory-buffer.js';
import { SummarizationService } from './services/summarization.js';
import { VectorContextStore } from './services/vector-store.js';
import type { EmbeddingProvider, TurnResult } from './types/index.js';

const EXIT_COMMANDS = new Set(['exit', 'quit', 'bye']);

function isRetryable(error: unknown): boolean {
  if (!(error instanceof ProviderError)) {
    return false;
  }
  return error.status === 429 ||
    error.status === 503 ||
    error.reason === 'timeout' ||
    error.reason.includes('Connection error');
}

function createEmbedder(): EmbeddingProvider {
  if (CONFIG.EMBEDDING_PROVIDER === 'openai') {
    return new OpenAIEmbeddingProvider({
      apiKey: CONFIG.EMBEDDING_API_KEY,
      baseURL: CONFIG.EMBEDDING_BASE_URL,
      model: CONFIG.EMBEDDING_MODEL
    });
  }
  return new HashingEmbeddingProvider(CONFIG.EMBEDDING_DIMENSIONS);
}

function printResult(result: TurnResult): void {
  console.log(`\nAssistant: ${result.answer}`);
  if (result.citations.length > 0) {
    console.log('\nSources:');
    result.citations.forEach((url, idx) => console.log(`  [${idx + 1}] ${url}`));
  }
  if (result.lossyCompactions.length > 0) {
    console.log('\n⚠️  Some earlier history was dropped to stay within the token budget.');
  }
  if (result.partialFailures.length > 0) {
    console.log(`\n⚠️  Context could not be fully saved (${result.partialFailures.map(f => f.stage).join(', ')}).`);
  }
}

async function main() {
  if (!CONFIG.COMPLETION_API_KEY) {
    console.error('Error: COMPLETION_API_KEY not found in environment variables');
    console.error('Please create a .env file with your API key (see .env.example)');
    process.exit(1);
  }

  console.log('Context-Aware Chat');
  console.log('==================');
  console.log(`Token Budget: ${CONFIG.MAX_TOKENS} tokens`);
  console.log(`Store: ${CONFIG.STORE_PATH}/${CONFIG.STORE_COLLECTION}`);
  console.log('Commands: "exit", "quit" or "bye" to leave, "/context" to show tracked entities');
  console.log();

  const completion = new OpenAICompletionProvider({
    apiKey: CONFIG.COMPLETION_API_KEY,
    baseURL: CONFIG.COMPLETION_BASE_URL,
    model: CONFIG.COMPLETION_MODEL,
    temperature: CONFIG.COMPLETION_TEMPERATURE
  });

  const memory = new SummaryMemoryBuffer({
    tokenLimit: CONFIG.MAX_TOKENS,
    summarizer: new SummarizationService(completion),
    summaryRatio: CONFIG.SUMMARY_MAX_TOKENS_PCT / 100,
    minRecentTurns: CONFIG.MIN_RECENT_MESSAGES,
    compactionTimeoutMs: CONFIG.COMPACTION_TIMEOUT_MS
  });

  const store = new VectorContextStore({
    directory: CONFIG.STORE_PATH,
    collection: CONFIG.STORE_COLLECTION,
    embedder: createEmbedder()
  });

  const entities = new EntityStateTracker();

  const assembler = new ContextAssembler({
    completion,
    memory,
    entities,
    store,
    sessionId: CONFIG.SESSION_ID,
    retrievalTopK: CONFIG.TOP_K_RETRIEVAL,
    dispatchTimeoutMs: CONFIG.DISPATCH_TIMEOUT_MS
  });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });

  const askQuestion = (query: string): Promise<string> => {
    return new Promise(resolve => rl.question(query, resolve));
  };

  while (true) {
    const userInput = (await askQuestion('\nYou: ')).trim();

    if (EXIT_COMMANDS.has(userInput.toLowerCase())) {
      console.log('\nGoodbye! Thanks for chatting.');
      break;
    }

    if (userInput.toLowerCase() === '/context') {
      console.log(`\n${entities.render()}`);
      console.log(`[${memory.totalTokens()}/${memory.tokenLimit} tokens in buffer, ${store.size} stored records]`);
      continue;
    }

    if (!userInput) {
      continue;
    }

    // Failed turns leave every store untouched, so retrying is safe
    let retries = 0;
    const maxRetries = 3;

    while (true) {
      try {
        printResult(await assembler.ask(userInput));
        break;
      } catch (error) {
        if (isRetryable(error) && retries < maxRetries) {
          retries++;
          const waitTime = Math.min(1000 * Math.pow(2, retries - 1), 10000); // Exponential backoff, max 10s
          logger.warn({ retry: retries, maxRetries, waitTime }, 'Retryable provider error');
          console.log('\n⏳ Temporary issue, retrying...');
          await new Promise(resolve => setTimeout(resolve, waitTime));
          continue;
        }

        console.error(`\n❌ Error: ${describeError(error)}`);
        break;
      }
    }
  }

  rl.close();
  await store.close();
}

main().catch(error => {
  logger.fatal({ err: describeError(error) }, 'Fatal error');
  process.exit(1);
});
