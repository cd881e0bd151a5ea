/**
 * Summary Memory Buffer - COMPRESS Context Strategy
 * Keeps the active window plus one running summary under a token limit.
 * Every turn ever put is also kept in an append-only log.
 */

import type { LossyCompaction, LossyReason, PutResult, Role, Turn } from '../types/index.js';
import { CompactionFailedError, OversizedTurnError, TimeoutError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import { TokenCounter, createTurn, type TokenEstimator } from '../utils/token-counter.js';
import { withTimeout } from '../utils/timeout.js';
import { formatSummary, summaryOverheadTokens, type ConversationSummarizer } from './summarization.js';

const log = logger.child({ component: 'memory-buffer' });

export interface MemoryBufferOptions {
  tokenLimit: number;
  summarizer: ConversationSummarizer;
  /** Fraction of the limit reserved for the summary turn */
  summaryRatio?: number;
  /** Newest turns never folded into the summary */
  minRecentTurns?: number;
  compactionTimeoutMs?: number;
  estimateTokens?: TokenEstimator;
}

export class SummaryMemoryBuffer {
  private readonly messageLog: Turn[] = [];
  private window: Turn[] = [];
  private currentSummary: Turn | undefined;
  private compactionPending = false;

  private readonly summarizer: ConversationSummarizer;
  private readonly summaryRatio: number;
  private readonly minRecentTurns: number;
  private readonly compactionTimeoutMs: number | undefined;
  private readonly estimate: TokenEstimator;

  readonly tokenLimit: number;

  constructor(options: MemoryBufferOptions) {
    if (!Number.isInteger(options.tokenLimit) || options.tokenLimit <= 0) {
      throw new RangeError(`tokenLimit must be a positive integer, got ${options.tokenLimit}`);
    }
    this.tokenLimit = options.tokenLimit;
    this.summarizer = options.summarizer;
    this.summaryRatio = Math.min(Math.max(options.summaryRatio ?? 0.33, 0), 1);
    this.minRecentTurns = Math.max(options.minRecentTurns ?? 1, 0);
    this.compactionTimeoutMs = options.compactionTimeoutMs;
    this.estimate = options.estimateTokens ?? (text => TokenCounter.countText(text));
  }

  /**
   * Build a turn costed with this buffer's estimator
   */
  createTurn(role: Role, content: string, timestamp: number = Date.now()): Turn {
    return createTurn(role, content, timestamp, this.estimate);
  }

  get summary(): Turn | undefined {
    return this.currentSummary;
  }

  get activeWindow(): readonly Turn[] {
    return this.window;
  }

  /**
   * True after a failed compaction until the next successful one
   */
  get hasPendingCompaction(): boolean {
    return this.compactionPending;
  }

  /**
   * Every turn ever put, summarized or not
   */
  history(): readonly Turn[] {
    return this.messageLog;
  }

  totalTokens(): number {
    return (this.currentSummary?.tokenCost ?? 0) + TokenCounter.countTurns(this.window);
  }

  /**
   * Material for the completion provider: [summary?, ...active window]
   */
  get(): Turn[] {
    return this.currentSummary ? [this.currentSummary, ...this.window] : [...this.window];
  }

  /**
   * Append a turn, compacting when the buffer goes over budget.
   * Throws OversizedTurnError (turn not appended) or CompactionFailedError
   * (turn appended, buffer left over budget until the next put).
   */
  async put(turn: Turn): Promise<PutResult> {
    if (turn.tokenCost > this.tokenLimit) {
      throw new OversizedTurnError(turn.tokenCost, this.tokenLimit);
    }

    this.messageLog.push(turn);
    this.window.push(turn);

    return this.compact();
  }

  /**
   * Fold the oldest turns into the summary if the buffer is over budget
   */
  async compact(): Promise<PutResult> {
    const total = this.totalTokens();
    if (total <= this.tokenLimit) {
      this.compactionPending = false;
      return { compacted: false, summarizedTurns: 0 };
    }

    const summaryBudget = Math.max(Math.floor(this.tokenLimit * this.summaryRatio), 1);
    const prefixLength = this.selectPrefix(summaryBudget);

    if (prefixLength === 0) {
      // Nothing left that may be summarized; only dropping can restore the budget
      return {
        compacted: false,
        summarizedTurns: 0,
        lossy: this.dropUntilWithinBudget('oversized-summary')
      };
    }

    const prefix = this.window.slice(0, prefixLength);
    const targetTokens = Math.max(summaryBudget - summaryOverheadTokens(), 1);

    let condensed: string;
    try {
      condensed = await withTimeout(
        signal => this.summarizer.summarize({ priorSummary: this.currentSummary, turns: prefix, targetTokens }, signal),
        this.compactionTimeoutMs
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        log.warn({ timeoutMs: error.timeoutMs }, 'Compaction timed out, dropping oldest turns');
        return {
          compacted: false,
          summarizedTurns: 0,
          lossy: this.dropUntilWithinBudget('compaction-timeout')
        };
      }

      this.compactionPending = true;
      log.warn({ overBudgetBy: total - this.tokenLimit, err: describeError(error) }, 'Compaction failed, will retry on next put');
      throw new CompactionFailedError(total - this.tokenLimit, error);
    }

    this.currentSummary = this.createTurn('system', formatSummary(condensed));
    this.window = this.window.slice(prefixLength);
    this.compactionPending = false;

    log.info(
      { summarizedTurns: prefixLength, summaryTokens: this.currentSummary.tokenCost, totalTokens: this.totalTokens() },
      'Compacted conversation history'
    );

    const lossy = this.totalTokens() > this.tokenLimit
      ? this.dropUntilWithinBudget('oversized-summary')
      : undefined;

    return { compacted: true, summarizedTurns: prefixLength, lossy };
  }

  /**
   * Shortest oldest prefix whose removal leaves room for a summary of summaryBudget tokens
   */
  private selectPrefix(summaryBudget: number): number {
    const maxPrefix = Math.max(this.window.length - this.minRecentTurns, 0);
    let remaining = TokenCounter.countTurns(this.window);
    let length = 0;

    while (length < maxPrefix && remaining + summaryBudget > this.tokenLimit) {
      remaining -= this.window[length].tokenCost;
      length++;
    }

    return length;
  }

  /**
   * Lossy fallback: evict oldest window turns, then the summary, until within budget.
   * The newest turn always survives (put() rejects turns larger than the limit).
   */
  private dropUntilWithinBudget(reason: LossyReason): LossyCompaction {
    const droppedTurns: Turn[] = [];
    while (this.totalTokens() > this.tokenLimit && this.window.length > 1) {
      const oldest = this.window.shift();
      if (oldest) droppedTurns.push(oldest);
    }

    let droppedSummary = false;
    if (this.totalTokens() > this.tokenLimit && this.currentSummary) {
      this.currentSummary = undefined;
      droppedSummary = true;
    }

    this.compactionPending = false;
    log.warn({ reason, droppedTurns: droppedTurns.length, droppedSummary }, 'Lossy compaction');

    return { reason, droppedTurns, droppedSummary };
  }
}
