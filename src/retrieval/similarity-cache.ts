import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { config } from '../core/config';
import { logger } from '../core/logger';
import { getErrorMessage } from '../core/errors';
import { Embedder } from '../services/embedding.service';
import { SourceDocument } from '../types';
import { FlatL2Index } from './flat-index';

const EMBED_CONTENT_CHARS = 500;
const SNAPSHOT_VERSION = 1;

const DocumentSchema = z.object({
  kind: z.enum(['graph', 'graph_related', 'internet', 'news', 'semantic']),
  title: z.string(),
  content: z.string(),
  reference: z.string(),
  confidence: z.number(),
  category: z.string().optional(),
  publishedDate: z.string().optional(),
  relationships: z.array(z.object({ relation: z.string(), target: z.string() })).optional(),
  source: z.string().optional(),
});

const SnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  embedder: z.string(),
  dimension: z.number().int().positive().nullable(),
  vectors: z.array(z.array(z.number())),
  documents: z.array(DocumentSchema),
});

type Snapshot = z.infer<typeof SnapshotSchema>;

export interface SimilarityCacheOptions {
  /** Snapshot file; `null` keeps the cache purely in memory */
  path?: string | null;
  /** Save after every N stored documents */
  persistEvery?: number;
}

export interface SimilarityCacheStats {
  documents: number;
  vectors: number;
  dimension: number | null;
  embedder: string;
}

/**
 * Append-only memory of previously fetched documents with a parallel vector
 * index: `documents[i]` is always paired with vector `i`.
 *
 * Inserts run one at a time through a promise chain, and each one embeds
 * before touching state, so a failed embedding leaves both halves as they were.
 * Lookups may run alongside inserts.
 */
export class SimilarityCache {
  private documents: SourceDocument[] = [];
  private index: FlatL2Index | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private saveChain: Promise<void> = Promise.resolve();
  private readonly filePath: string | null;
  private readonly persistEvery: number;

  constructor(private embedder: Embedder, options: SimilarityCacheOptions = {}) {
    this.filePath = options.path === undefined ? config.cache.path : options.path;
    this.persistEvery = Math.max(1, options.persistEvery ?? config.cache.persistEvery);
  }

  size(): number {
    return this.documents.length;
  }

  stats(): SimilarityCacheStats {
    return {
      documents: this.documents.length,
      vectors: this.index?.size() ?? 0,
      dimension: this.index?.dimension ?? null,
      embedder: this.embedder.name,
    };
  }

  /**
   * Best-effort: embedding or index failures are logged and never reach the
   * caller.
   */
  insert(document: SourceDocument): Promise<void> {
    this.writeChain = this.writeChain.then(() => this.insertNow(document));
    return this.writeChain;
  }

  async query(text: string, k: number): Promise<SourceDocument[]> {
    if (this.documents.length === 0 || k <= 0) {
      return [];
    }

    try {
      const vector = await this.embedder.embed(text);
      const index = this.index;
      if (!index) return [];

      const hits = index.search(vector, Math.min(k, this.documents.length));
      const results = hits.map(hit => ({
        ...this.documents[hit.position],
        kind: 'semantic' as const,
        confidence: Math.max(0.1, 1 - hit.distance / 10),
        source: 'semantic_search',
      }));

      logger.debug('Semantic search completed', { results: results.length, cached: this.documents.length });
      return results;
    } catch (error) {
      logger.warn('Semantic search failed', { error: getErrorMessage(error) });
      return [];
    }
  }

  /**
   * Waits for queued inserts, then writes a snapshot.
   */
  async flush(): Promise<void> {
    await this.writeChain;
    await this.save();
  }

  /**
   * Writes (vectors, documents) to a temp file and renames it over the
   * snapshot, so readers never see a half-written file.
   */
  save(): Promise<void> {
    const snapshot = this.snapshot();
    this.saveChain = this.saveChain.then(() => this.writeSnapshot(snapshot));
    return this.saveChain;
  }

  /**
   * Replaces in-memory state with the snapshot on disk. Any problem with the
   * file leaves the cache empty.
   */
  async load(): Promise<void> {
    await this.writeChain;

    if (!this.filePath) {
      this.clear();
      return;
    }

    try {
      const raw = await fs.readFile(this.filePath, 'utf-8');
      const snapshot = SnapshotSchema.parse(JSON.parse(raw));
      this.restore(snapshot);
      logger.info('Similarity cache loaded', { documents: this.documents.length });
    } catch (error) {
      this.clear();
      logger.warn('Similarity cache not loaded - starting empty', {
        path: this.filePath,
        error: getErrorMessage(error),
      });
    }
  }

  clear(): void {
    this.documents = [];
    this.index = null;
  }

  private async insertNow(document: SourceDocument): Promise<void> {
    try {
      const text = `${document.title} ${document.content.substring(0, EMBED_CONTENT_CHARS)}`;
      const vector = await this.embedder.embed(text);

      const index = this.index ?? new FlatL2Index(vector.length);
      index.add(vector);
      this.index = index;
      this.documents.push(document);

      if (this.documents.length % this.persistEvery === 0) {
        await this.save();
      }
    } catch (error) {
      logger.warn('Failed to add document to similarity cache', {
        reference: document.reference,
        error: getErrorMessage(error),
      });
    }
  }

  private snapshot(): Snapshot {
    const serialized = this.index?.toJSON();
    return {
      version: SNAPSHOT_VERSION,
      embedder: this.embedder.name,
      dimension: serialized?.dimension ?? null,
      vectors: serialized?.vectors ?? [],
      documents: this.documents.map(document => ({
        ...document,
        relationships: document.relationships ? [...document.relationships] : undefined,
      })),
    };
  }

  private async writeSnapshot(snapshot: Snapshot): Promise<void> {
    if (!this.filePath) return;

    const tempPath = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(snapshot), 'utf-8');
      await fs.rename(tempPath, this.filePath);
      logger.debug('Similarity cache saved', { documents: snapshot.documents.length });
    } catch (error) {
      logger.error('Failed to save similarity cache', {
        path: this.filePath,
        error: getErrorMessage(error),
      });
    }
  }

  private restore(snapshot: Snapshot): void {
    if (snapshot.embedder !== this.embedder.name) {
      throw new Error(`Snapshot was built with ${snapshot.embedder}, current embedder is ${this.embedder.name}`);
    }
    if (snapshot.vectors.length !== snapshot.documents.length) {
      throw new Error(
        `Snapshot has ${snapshot.vectors.length} vectors for ${snapshot.documents.length} documents`
      );
    }

    if (snapshot.dimension === null) {
      if (snapshot.documents.length > 0) {
        throw new Error('Snapshot has documents but no index dimension');
      }
      this.clear();
      return;
    }

    const index = FlatL2Index.fromJSON({ dimension: snapshot.dimension, vectors: snapshot.vectors });
    this.index = index;
    this.documents = snapshot.documents;
  }
}
