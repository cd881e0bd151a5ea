/**
 * Vector Context Store - persistent, embedding-indexed record collection
 *
 * Layout: <directory>/<collection>/collection.json holds the fixed embedding
 * dimension; every record is its own rec_NNNNNN.json file. Reopening the same
 * location reloads every record.
 *
 * Files are created exclusively and never overwritten, so several handles
 * (one per session) can share a location: an id already taken on disk is
 * loaded and the insert moves on to the next one.
 */

import { existsSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { link, open, rm } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type {
  EmbeddingProvider,
  MetadataMap,
  RecordFilter,
  RetrievedRecord,
  Role,
  StoredRecord
} from '../types/index.js';
import { DimensionMismatchError, EmbeddingUnavailableError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import { TextProcessor } from '../utils/text-processing.js';
import { rankRecords } from './retrieval.js';

const log = logger.child({ component: 'vector-store' });

const MANIFEST_FILE = 'collection.json';
const RECORD_FILE = /^rec_(\d+)\.json$/;

const recordSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  role: z.enum(['user', 'assistant', 'system']),
  timestamp: z.number().finite(),
  metadata: z.record(z.string()),
  embedding: z.array(z.number().finite()).min(1)
});

const manifestSchema = z.object({
  name: z.string(),
  dimensions: z.number().int().positive(),
  createdAt: z.string()
});

export interface VectorStoreOptions {
  directory: string;
  collection: string;
  embedder: EmbeddingProvider;
  /** Fix the dimension up front; otherwise the first insert fixes it */
  dimensions?: number;
}

export class VectorContextStore {
  private readonly records = new Map<string, StoredRecord>();
  private readonly collectionPath: string;
  private readonly embedder: EmbeddingProvider;
  private readonly collection: string;
  private dimensions: number | undefined;
  private nextId = 1;
  private manifestReady = false;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(options: VectorStoreOptions) {
    if (!/^[\w-]+$/.test(options.collection)) {
      throw new Error(`Invalid collection name: ${options.collection}`);
    }
    this.collection = options.collection;
    this.collectionPath = join(options.directory, options.collection);
    this.embedder = options.embedder;
    this.dimensions = options.dimensions;
    this.loadCollection();
  }

  get size(): number {
    return this.records.size;
  }

  get embeddingDimensions(): number | undefined {
    return this.dimensions;
  }

  get(id: string): StoredRecord | undefined {
    return this.records.get(id);
  }

  list(): StoredRecord[] {
    return Array.from(this.records.values());
  }

  /**
   * Embed and persist a record. All-or-nothing: on failure nothing is written
   * and the record is not visible.
   */
  async insert(
    text: string,
    role: Role,
    timestamp: number = Date.now(),
    metadata: MetadataMap = {}
  ): Promise<string> {
    const embedding = await this.embed(text);

    return this.enqueueWrite(async () => {
      if (this.dimensions !== undefined && embedding.length !== this.dimensions) {
        throw new DimensionMismatchError(this.dimensions, embedding.length);
      }

      if (!existsSync(this.collectionPath)) {
        mkdirSync(this.collectionPath, { recursive: true });
      }

      await this.ensureManifest(embedding.length);
      this.dimensions = embedding.length;

      for (let seq = this.nextId; ; seq++) {
        const id = `rec_${seq.toString().padStart(6, '0')}`;
        const record: StoredRecord = { id, text, role, timestamp, metadata: { ...metadata }, embedding };

        if (await writeJsonExclusive(join(this.collectionPath, `${id}.json`), record)) {
          this.nextId = seq + 1;
          this.records.set(id, record);
          log.debug({ id, role, text: TextProcessor.preview(text) }, 'Stored record');
          return id;
        }

        log.debug({ id }, 'Record id taken by another writer');
        this.loadRecordFile(`${id}.json`);
      }
    });
  }

  /**
   * Top K records most similar to the query text
   */
  async retrieve(queryText: string, topK: number, filter?: RecordFilter): Promise<RetrievedRecord[]> {
    if (!queryText.trim() || topK <= 0 || this.records.size === 0) {
      return [];
    }
    const queryVector = await this.embed(queryText);
    return this.search(queryVector, topK, filter);
  }

  /**
   * Rank against an already computed query vector
   */
  search(queryVector: readonly number[], topK: number, filter?: RecordFilter): RetrievedRecord[] {
    if (this.dimensions !== undefined && queryVector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, queryVector.length);
    }
    return rankRecords(this.records.values(), queryVector, topK, filter);
  }

  /**
   * Wait for in-flight writes
   */
  async close(): Promise<void> {
    await this.writeQueue;
  }

  private async embed(text: string): Promise<number[]> {
    let vector: number[];
    try {
      vector = await this.embedder.embed(text);
    } catch (error) {
      if (error instanceof EmbeddingUnavailableError) throw error;
      throw new EmbeddingUnavailableError(describeError(error), error);
    }

    if (vector.length === 0 || vector.some(v => !Number.isFinite(v))) {
      throw new EmbeddingUnavailableError('provider returned an invalid vector');
    }
    return vector;
  }

  /**
   * Single writer per store: tasks run one after another in call order.
   */
  private enqueueWrite<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task);
    // The caller receives failures through `run`; the queue only keeps order
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Create the manifest, or check the one another writer created first
   */
  private async ensureManifest(dimensions: number): Promise<void> {
    if (this.manifestReady) {
      return;
    }

    const manifestPath = join(this.collectionPath, MANIFEST_FILE);
    const created = await writeJsonExclusive(manifestPath, {
      name: this.collection,
      dimensions,
      createdAt: new Date().toISOString()
    });
    if (!created) {
      const manifest = readManifest(manifestPath);
      if (manifest.dimensions !== dimensions) {
        throw new DimensionMismatchError(manifest.dimensions, dimensions);
      }
    }
    this.manifestReady = true;
  }

  private loadCollection(): void {
    if (!existsSync(this.collectionPath)) {
      log.info({ path: this.collectionPath }, 'Collection not found; it will be created on first insert');
      return;
    }

    const manifestPath = join(this.collectionPath, MANIFEST_FILE);
    if (existsSync(manifestPath)) {
      const manifest = readManifest(manifestPath);
      if (this.dimensions !== undefined && this.dimensions !== manifest.dimensions) {
        throw new DimensionMismatchError(manifest.dimensions, this.dimensions);
      }
      this.dimensions = manifest.dimensions;
      this.manifestReady = true;
    }

    const files = readdirSync(this.collectionPath).filter(f => RECORD_FILE.test(f));
    for (const file of files) {
      this.loadRecordFile(file);
    }

    log.info({ collection: this.collection, records: this.records.size }, 'Loaded collection');
  }

  private loadRecordFile(file: string): void {
    try {
      const parsed = recordSchema.safeParse(JSON.parse(readFileSync(join(this.collectionPath, file), 'utf-8')));
      if (!parsed.success) {
        log.warn({ file, issues: parsed.error.issues.length }, 'Invalid record file: skipping');
        return;
      }

      const record = parsed.data;
      if (this.dimensions !== undefined && record.embedding.length !== this.dimensions) {
        log.warn({ file, dimensions: record.embedding.length }, 'Record dimension differs from collection: skipping');
        return;
      }
      this.dimensions ??= record.embedding.length;
      this.records.set(record.id, record);

      // Track highest ID for generating new IDs
      const idNum = parseInt(record.id.replace('rec_', ''), 10);
      if (!isNaN(idNum) && idNum >= this.nextId) {
        this.nextId = idNum + 1;
      }
    } catch (error) {
      log.warn({ file, err: describeError(error) }, 'Failed to load record file: skipping');
    }
  }
}

function readManifest(path: string): z.infer<typeof manifestSchema> {
  return manifestSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

let tmpCounter = 0;

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Write to a private temp file, fsync, then hard-link it into place.
 * Resolves false when the target already exists; an existing file is never replaced.
 */
async function writeJsonExclusive(path: string, value: unknown): Promise<boolean> {
  const tmpPath = `${path}.${process.pid}.${++tmpCounter}.tmp`;
  try {
    const handle = await open(tmpPath, 'wx');
    try {
      await handle.writeFile(JSON.stringify(value, null, 2), 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    try {
      await link(tmpPath, path);
    } catch (error) {
      if (isAlreadyExists(error)) return false;
      throw error;
    }
    return true;
  } finally {
    await rm(tmpPath, { force: true });
  }
}
