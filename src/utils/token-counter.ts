/**
 * Token counter utility
 * Uses simple character-based approximation: 1 token ≈ 4 characters
 */

import type { ChatMessage, Role, Turn } from '../types/index.js';

export type TokenEstimator = (text: string) => number;

export class TokenCounter {
  private static readonly CHARS_PER_TOKEN = 4;

  /**
   * Estimate tokens for a text string
   */
  static countText(text: string): number {
    return Math.ceil(text.length / this.CHARS_PER_TOKEN);
  }

  /**
   * Count tokens in a chat message
   */
  static countMessage(message: ChatMessage): number {
    return this.countText(message.content);
  }

  static countMessages(messages: ChatMessage[]): number {
    return messages.reduce((total, msg) => total + this.countMessage(msg), 0);
  }

  /**
   * Sum of cached turn costs
   */
  static countTurns(turns: readonly Turn[]): number {
    return turns.reduce((total, turn) => total + turn.tokenCost, 0);
  }
}

/**
 * Create an immutable turn with its token cost cached
 */
export function createTurn(
  role: Role,
  content: string,
  timestamp: number = Date.now(),
  estimate: TokenEstimator = text => TokenCounter.countText(text)
): Turn {
  return Object.freeze({ role, content, timestamp, tokenCost: estimate(content) });
}
