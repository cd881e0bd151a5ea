/**
 * Summarization Service - COMPRESS Context Strategy
 * Folds the oldest turns (and any prior summary) into a single summary turn
 */

import type { CompletionProvider, Turn } from '../types/index.js';
import { ProviderError } from '../errors.js';
import { TokenCounter } from '../utils/token-counter.js';

export const SUMMARY_PREFIX = '[Previous conversation summary: ';
export const SUMMARY_SUFFIX = ']';

export interface SummarizeInput {
  priorSummary?: Turn;
  turns: readonly Turn[];
  targetTokens: number;
}

export interface ConversationSummarizer {
  summarize(input: SummarizeInput, signal?: AbortSignal): Promise<string>;
}

export interface SummarizationOptions {
  temperature?: number;
}

/**
 * Wrap condensed text the way it is stored in the buffer
 */
export function formatSummary(condensed: string): string {
  return `${SUMMARY_PREFIX}${condensed.trim()}${SUMMARY_SUFFIX}`;
}

/**
 * Tokens the summary wrapper costs on top of the condensed text
 */
export function summaryOverheadTokens(): number {
  return TokenCounter.countText(SUMMARY_PREFIX + SUMMARY_SUFFIX);
}

export class SummarizationService implements ConversationSummarizer {
  constructor(
    private readonly provider: CompletionProvider,
    private readonly options: SummarizationOptions = {}
  ) {}

  /**
   * Condense a prior summary plus a prefix of turns into plain text.
   * Provider failures propagate; the buffer decides what to do with them.
   */
  async summarize(input: SummarizeInput, signal?: AbortSignal): Promise<string> {
    if (input.turns.length === 0) {
      throw new Error('Cannot summarize empty turn array');
    }

    const conversationText = input.turns
      .map(t => `${t.role}: ${t.content}`)
      .join('\n');

    const systemPrompt = `You are a conversation summarizer. Condense this conversation history, preserving facts, names, and figures.

The summary should:
- Merge the existing summary (if any) with the new conversation segment
- Keep every name, number, date and decision that was stated
- Maintain chronological flow
- Be at most ${Math.floor(input.targetTokens * 4)} characters (about ${input.targetTokens} tokens)
- Use third person ("The user asked about...", "The assistant explained...")`;

    const parts: string[] = [];
    if (input.priorSummary) {
      parts.push(`Existing summary:\n${input.priorSummary.content}`);
    }
    parts.push(`Conversation segment to fold in:\n${conversationText}`);

    const response = await this.provider.complete({
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: parts.join('\n\n') }
      ],
      temperature: this.options.temperature ?? 0.3,
      maxTokens: Math.max(input.targetTokens, 1),
      signal
    });

    const condensed = response.content.trim();
    if (!condensed) {
      throw new ProviderError('empty summary returned');
    }
    return condensed;
  }
}
