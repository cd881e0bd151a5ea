/**
 * Retrieval Service - SELECT Context Strategy
 * Scores stored records against a query embedding and ranks them
 */

import type { RecordFilter, RetrievedRecord, StoredRecord } from '../types/index.js';
import { DimensionMismatchError } from '../errors.js';

/**
 * Cosine similarity; zero vectors score 0
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function matchesFilter(record: StoredRecord, filter?: RecordFilter): boolean {
  if (!filter) {
    return true;
  }
  if (filter.role && record.role !== filter.role) {
    return false;
  }
  if (filter.metadata) {
    for (const [key, value] of Object.entries(filter.metadata)) {
      if (record.metadata[key] !== value) {
        return false;
      }
    }
  }
  return true;
}

/**
 * Top K records by descending similarity.
 * Ties go to the most recent timestamp, then the larger id, so order is total.
 */
export function rankRecords(
  records: Iterable<StoredRecord>,
  queryVector: readonly number[],
  topK: number,
  filter?: RecordFilter
): RetrievedRecord[] {
  if (topK <= 0) {
    return [];
  }

  const scored: RetrievedRecord[] = [];
  for (const record of records) {
    if (matchesFilter(record, filter)) {
      scored.push({ ...record, score: cosineSimilarity(queryVector, record.embedding) });
    }
  }

  return scored
    .sort((a, b) =>
      b.score - a.score ||
      b.timestamp - a.timestamp ||
      (a.id < b.id ? 1 : a.id > b.id ? -1 : 0)
    )
    .slice(0, topK);
}
