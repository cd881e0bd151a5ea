/**
 * Context Assembler - orchestrates one conversational turn
 *
 * idle -> collecting -> dispatching -> updating -> idle
 *
 * Nothing is written to any store until the completion provider has answered.
 * After that, store writes are best effort: failures are reported on the
 * result and never discard the answer.
 */

import type {
  AssemblerPhase,
  ChatMessage,
  CompletionProvider,
  CompletionResponse,
  DegradedCollection,
  LossyCompaction,
  MetadataMap,
  PartialUpdateFailure,
  RetrievedRecord,
  Turn,
  TurnResult,
  UpdateStage
} from '../types/index.js';
import {
  OversizedTurnError,
  ProviderError,
  TimeoutError,
  TurnInProgressError,
  describeError,
  toError
} from '../errors.js';
import { logger } from '../logger.js';
import { TokenCounter } from '../utils/token-counter.js';
import { TextProcessor } from '../utils/text-processing.js';
import { withTimeout } from '../utils/timeout.js';
import { citationsOf } from './completion-provider.js';
import type { EntityStateTracker } from './entity-tracker.js';
import type { SummaryMemoryBuffer } from './memory-buffer.js';
import type { VectorContextStore } from './vector-store.js';

const log = logger.child({ component: 'context-assembler' });

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful AI assistant that maintains context across multiple questions.';

export interface ContextAssemblerOptions {
  completion: CompletionProvider;
  memory: SummaryMemoryBuffer;
  entities: EntityStateTracker;
  /** Optional: without a store there is no cross-session recall */
  store?: VectorContextStore;
  systemPrompt?: string;
  /** Tagged onto every stored record as metadata.sessionId */
  sessionId?: string;
  /** Restrict recall to this session's records */
  scopeRetrievalToSession?: boolean;
  retrievalTopK?: number;
  dispatchTimeoutMs?: number;
  temperature?: number;
  maxOutputTokens?: number;
  now?: () => number;
}

interface CollectedContext {
  messages: ChatMessage[];
  retrieved: RetrievedRecord[];
  degraded: DegradedCollection[];
  promptTokens: number;
}

export class ContextAssembler {
  private currentPhase: AssemblerPhase = 'idle';
  private readonly systemPrompt: string;
  private readonly retrievalTopK: number;
  private readonly now: () => number;

  constructor(private readonly options: ContextAssemblerOptions) {
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.retrievalTopK = options.retrievalTopK ?? 3;
    this.now = options.now ?? Date.now;
  }

  get phase(): AssemblerPhase {
    return this.currentPhase;
  }

  /**
   * Answer one user query. Rejects with ProviderError (no store touched),
   * OversizedTurnError (query larger than the buffer) or TurnInProgressError.
   */
  async ask(query: string): Promise<TurnResult> {
    if (this.currentPhase !== 'idle') {
      throw new TurnInProgressError();
    }

    try {
      this.currentPhase = 'collecting';
      const userTurn = this.options.memory.createTurn('user', query, this.now());
      if (userTurn.tokenCost > this.options.memory.tokenLimit) {
        throw new OversizedTurnError(userTurn.tokenCost, this.options.memory.tokenLimit);
      }
      const context = await this.collect(userTurn);

      this.currentPhase = 'dispatching';
      const response = await this.dispatch(context.messages);

      this.currentPhase = 'updating';
      const assistantTurn = this.options.memory.createTurn('assistant', response.content, this.now());
      const { lossyCompactions, partialFailures } = await this.update(userTurn, assistantTurn);

      return {
        answer: response.content,
        citations: citationsOf(response),
        retrieved: context.retrieved,
        promptTokens: context.promptTokens,
        lossyCompactions,
        partialFailures,
        degraded: context.degraded
      };
    } finally {
      this.currentPhase = 'idle';
    }
  }

  /**
   * Gather buffer turns, recalled records and entity context. A failing
   * recall degrades the turn instead of aborting it.
   */
  private async collect(userTurn: Turn): Promise<CollectedContext> {
    const { memory, entities, store } = this.options;
    const degraded: DegradedCollection[] = [];

    let retrieved: RetrievedRecord[] = [];
    if (store && this.retrievalTopK > 0) {
      try {
        const metadata = this.options.scopeRetrievalToSession && this.options.sessionId
          ? { sessionId: this.options.sessionId }
          : undefined;
        const inWindow = new Set(memory.activeWindow.map(turn => turn.content));
        // Assistant answers are left out of recall to keep earlier replies from echoing.
        // Over-fetch by the window size; records already in the window are dropped before top K
        const candidates = await store.retrieve(
          userTurn.content,
          this.retrievalTopK + memory.activeWindow.length,
          { role: 'user', metadata }
        );
        retrieved = candidates
          .filter(record => !inWindow.has(record.text))
          .slice(0, this.retrievalTopK);
      } catch (error) {
        log.warn({ err: describeError(error) }, 'Retrieval failed, continuing without recalled context');
        degraded.push({ source: 'store', error: toError(error) });
      }
    }

    const preamble = this.formatPreamble(memory.summary, entities.render(), retrieved);
    const messages: ChatMessage[] = [
      { role: 'system', content: preamble },
      ...memory.activeWindow.map(turn => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: userTurn.content }
    ];
    const promptTokens = TokenCounter.countMessages(messages);

    log.debug(
      { promptTokens, windowTurns: memory.activeWindow.length, retrieved: retrieved.length, hasSummary: Boolean(memory.summary) },
      'Collected context'
    );

    return { messages, retrieved, degraded, promptTokens };
  }

  private async dispatch(messages: ChatMessage[]): Promise<CompletionResponse> {
    try {
      return await withTimeout(
        signal => this.options.completion.complete({
          messages,
          temperature: this.options.temperature,
          maxTokens: this.options.maxOutputTokens,
          signal
        }),
        this.options.dispatchTimeoutMs
      );
    } catch (error) {
      log.error({ err: describeError(error) }, 'Completion failed; turn aborted without store changes');
      if (error instanceof ProviderError) throw error;
      if (error instanceof TimeoutError) throw new ProviderError('timeout', error);
      throw new ProviderError(describeError(error), error);
    }
  }

  /**
   * Memory buffer first, then the vector store, then entities.
   */
  private async update(
    userTurn: Turn,
    assistantTurn: Turn
  ): Promise<{ lossyCompactions: LossyCompaction[]; partialFailures: PartialUpdateFailure[] }> {
    const { memory, entities, store } = this.options;
    const lossyCompactions: LossyCompaction[] = [];
    const partialFailures: PartialUpdateFailure[] = [];

    const fail = (stage: UpdateStage, error: unknown): void => {
      log.error({ stage, err: describeError(error) }, 'Post-response update failed');
      partialFailures.push({ stage, error: toError(error) });
    };

    for (const turn of [userTurn, assistantTurn]) {
      try {
        const result = await memory.put(turn);
        if (result.lossy) lossyCompactions.push(result.lossy);
      } catch (error) {
        fail('memory', error);
      }
    }

    if (store) {
      const metadata: MetadataMap = this.options.sessionId ? { sessionId: this.options.sessionId } : {};
      try {
        for (const turn of [userTurn, assistantTurn]) {
          await store.insert(turn.content, turn.role, turn.timestamp, metadata);
        }
      } catch (error) {
        fail('store', error);
      }
    }

    try {
      entities.update(`${userTurn.content}\n\n${assistantTurn.content}`);
    } catch (error) {
      fail('entities', error);
    }

    return { lossyCompactions, partialFailures };
  }

  /**
   * System preamble: instructions, running summary, entity context, recalled turns
   */
  private formatPreamble(summary: Turn | undefined, entityContext: string, retrieved: RetrievedRecord[]): string {
    let result = `${this.systemPrompt}\nCurrent conversation context: ${entityContext}`;

    if (summary) {
      result += `\n\n## Conversation Summary:\n\n${summary.content}`;
    }

    if (retrieved.length > 0) {
      const recalled = retrieved
        .map(record => `User: ${TextProcessor.normalizeWhitespace(record.text)}`)
        .join('\n');
      result += `\n\n## Conversation History:\n\n${recalled}\n\nAnswer the latest query using this context.`;
    }

    return result;
  }
}
