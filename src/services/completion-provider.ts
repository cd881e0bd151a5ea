/**
 * Completion provider adapter for OpenAI-compatible chat endpoints (Perplexity Sonar by default)
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type { ChatMessage, CompletionProvider, CompletionRequest, CompletionResponse } from '../types/index.js';
import { ProviderError, describeError } from '../errors.js';

export interface OpenAICompletionOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  temperature?: number;
}

// Sonar returns citations as a top-level URL list; newer payloads use search_results
const payloadSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional()
        })
      })
    )
    .min(1),
  citations: z.array(z.string()).optional(),
  search_results: z.array(z.object({ url: z.string() })).optional()
});

/**
 * Normalise a raw chat completion payload into a tagged response
 */
export function parseCompletionPayload(raw: unknown): CompletionResponse {
  const parsed = payloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderError('malformed completion payload', parsed.error);
  }

  const content = parsed.data.choices[0].message.content ?? '';
  if (!content.trim()) {
    throw new ProviderError('empty completion');
  }

  const urls = [
    ...(parsed.data.citations ?? []),
    ...(parsed.data.search_results ?? []).map(result => result.url)
  ].filter(url => url.trim().length > 0);
  const citations = Array.from(new Set(urls));

  return citations.length > 0
    ? { kind: 'cited', content, citations }
    : { kind: 'plain', content };
}

export function citationsOf(response: CompletionResponse): string[] {
  return response.kind === 'cited' ? response.citations : [];
}

function toMessageParam(message: ChatMessage) {
  switch (message.role) {
    case 'system':
      return { role: 'system' as const, content: message.content };
    case 'user':
      return { role: 'user' as const, content: message.content };
    case 'assistant':
      return { role: 'assistant' as const, content: message.content };
  }
}

function describeFailure(error: unknown): { reason: string; status?: number } {
  if (error instanceof OpenAI.APIUserAbortError) {
    return { reason: 'request aborted' };
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return { reason: 'timeout' };
  }
  if (error instanceof OpenAI.APIError) {
    return { reason: `status ${error.status ?? 'unknown'}: ${error.message}`, status: error.status };
  }
  return { reason: describeError(error) };
}

export class OpenAICompletionProvider implements CompletionProvider {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAICompletionOptions) {
    // Retries are the caller's decision
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    let raw: unknown;
    try {
      raw = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: request.messages.map(toMessageParam),
          temperature: request.temperature ?? this.options.temperature,
          max_tokens: request.maxTokens
        },
        { signal: request.signal }
      );
    } catch (error) {
      const { reason, status } = describeFailure(error);
      throw new ProviderError(reason, error, status);
    }

    return parseCompletionPayload(raw);
  }
}
