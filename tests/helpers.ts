import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi } from 'vitest';
import type { CompletionRequest, CompletionResponse, EmbeddingProvider } from '../src/types/index.js';
import type { SummarizeInput } from '../src/services/summarization.js';

/**
 * Text of exactly `tokens` tokens under the 4 chars/token estimate
 */
export function textOfTokens(tokens: number, label: string = ''): string {
  return label.padEnd(tokens * 4, '.');
}

export function makeTempDir(): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), 'conversation-context-'));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}

export function fakeSummarizer(output: string = 'short') {
  const summarize = vi.fn<(input: SummarizeInput, signal?: AbortSignal) => Promise<string>>()
    .mockResolvedValue(output);
  return { summarize };
}

export function fakeCompletion(response: CompletionResponse) {
  const complete = vi.fn<(request: CompletionRequest) => Promise<CompletionResponse>>()
    .mockResolvedValue(response);
  return { complete };
}

/**
 * Embedder returning a fixed vector per exact text, for hand-picked similarities
 */
export function tableEmbedder(table: Record<string, number[]>, fallback: number[]): EmbeddingProvider {
  return {
    embed: async (text: string) => table[text] ?? fallback
  };
}
