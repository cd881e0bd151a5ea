/**
 * Text processing utilities for keyword extraction and matching
 */

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from',
  'has', 'he', 'in', 'is', 'it', 'its', 'of', 'on', 'that', 'the',
  'to', 'was', 'will', 'with', 'what', 'when', 'where', 'who', 'how',
  'about', 'all', 'any', 'but', 'can', 'did', 'do', 'if', 'no', 'not',
  'or', 'so', 'such', 'than', 'then', 'there', 'these', 'they', 'this',
  'those', 'you', 'your'
]);

export class TextProcessor {
  /**
   * Extract keywords from text by removing stop words and normalizing
   */
  static extractKeywords(text: string): string[] {
    return text
      .toLowerCase()
      .replace(/[^\w\s]/g, ' ')
      .split(/\s+/)
      .filter(word => word.length > 2 && !STOP_WORDS.has(word));
  }

  static calculateTermFrequency(text: string): Map<string, number> {
    const frequency = new Map<string, number>();
    for (const keyword of this.extractKeywords(text)) {
      frequency.set(keyword, (frequency.get(keyword) || 0) + 1);
    }
    return frequency;
  }

  /**
   * Whole-word, case-insensitive match ("age" does not match "message")
   */
  static containsWord(text: string, word: string): boolean {
    const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`\\b${escaped}\\b`, 'i').test(text);
  }

  /**
   * Collapse runs of whitespace and trim
   */
  static normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }

  /**
   * Attribute keys are lower snake case: "Prime Minister" -> "prime_minister"
   */
  static toAttributeKey(text: string): string {
    return this.normalizeWhitespace(text).toLowerCase().replace(/\s/g, '_');
  }

  /**
   * Single-line preview for log output
   */
  static preview(text: string, maxChars: number = 60): string {
    const flat = this.normalizeWhitespace(text);
    return flat.length <= maxChars ? flat : `${flat.substring(0, maxChars)}...`;
  }
}
