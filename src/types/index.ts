/**
 * Core type definitions for the conversation context layer
 */

export type Role = 'user' | 'assistant' | 'system';

/**
 * One role-tagged message. Turns are frozen on creation and never mutated.
 */
export interface Turn {
  readonly role: Role;
  readonly content: string;
  readonly timestamp: number; // epoch milliseconds
  readonly tokenCost: number;
}

export type MetadataMap = Record<string, string>;

export interface StoredRecord {
  id: string;
  text: string;
  role: Role;
  timestamp: number;
  metadata: MetadataMap;
  embedding: number[];
}

export interface RetrievedRecord extends StoredRecord {
  score: number;
}

export interface RecordFilter {
  role?: Role;
  metadata?: MetadataMap;
}

export type EntityValue = string | number | boolean;

export interface EntityRecord {
  name: string;
  attributes: Record<string, EntityValue>;
}

export interface EntityObservation {
  entity: string;
  attribute: string;
  value: EntityValue;
}

export interface EntityRule {
  name: string;
  extract(text: string): EntityObservation[];
}

// Provider boundary

export interface ChatMessage {
  role: Role;
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * Normalised completion output. Adapters decide the variant so callers never
 * probe raw payload fields.
 */
export type CompletionResponse =
  | { kind: 'plain'; content: string }
  | { kind: 'cited'; content: string; citations: string[] };

export interface CompletionProvider {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface EmbeddingProvider {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

// Signals and results

export type LossyReason = 'oversized-summary' | 'compaction-timeout';

export interface LossyCompaction {
  reason: LossyReason;
  droppedTurns: Turn[];
  droppedSummary: boolean;
}

export interface PutResult {
  compacted: boolean;
  summarizedTurns: number;
  lossy?: LossyCompaction;
}

export type UpdateStage = 'memory' | 'store' | 'entities';

export interface PartialUpdateFailure {
  stage: UpdateStage;
  error: Error;
}

export type CollectionSource = 'store';

export interface DegradedCollection {
  source: CollectionSource;
  error: Error;
}

export type AssemblerPhase = 'idle' | 'collecting' | 'dispatching' | 'updating';

export interface TurnResult {
  answer: string;
  citations: string[];
  retrieved: RetrievedRecord[];
  promptTokens: number;
  lossyCompactions: LossyCompaction[];
  partialFailures: PartialUpdateFailure[];
  degraded: DegradedCollection[];
}
