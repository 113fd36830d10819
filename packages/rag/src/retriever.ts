import type { EmbeddingProvider } from './types';
import { cosineSimilarity } from './similarity';

export type StoredChunkMetadata = Readonly<Record<string, unknown>>;

export interface RetrieverChunkInput {
  /** Overrides the generated `${documentId}_chunk_${n}` id. */
  id?: string;
  text: string;
  embedding: readonly number[];
  metadata?: Record<string, unknown>;
}

export interface StoredChunk {
  readonly id: string;
  readonly documentId: string;
  readonly text: string;
  readonly embedding: readonly number[];
  readonly metadata: StoredChunkMetadata;
}

export interface ScoredChunk {
  chunk: StoredChunk;
  score: number;
}

export interface EmbeddingRetrieverOptions {
  /** Fixes the collection dimension up front instead of adopting it from the first add. */
  dimension?: number;
  provider?: EmbeddingProvider;
  model?: string;
  topK?: number;
  similarityThreshold?: number;
}

export interface QueryTextOptions {
  topK?: number;
  similarityThreshold?: number;
  timeoutMs?: number;
}

export const DEFAULT_TOP_K = 5;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;

export class EmbeddingDimensionError extends Error {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number, options?: { cause?: unknown }) {
    super(`Embedding dimension mismatch: expected ${expected}, received ${received}`, options);
    this.name = 'EmbeddingDimensionError';
    this.expected = expected;
    this.received = received;
  }
}

export class DuplicateChunkIdError extends Error {
  readonly documentId: string;
  readonly chunkId: string;

  constructor(documentId: string, chunkId: string) {
    super(`Duplicate chunk id ${chunkId} in document ${documentId}`);
    this.name = 'DuplicateChunkIdError';
    this.documentId = documentId;
    this.chunkId = chunkId;
  }
}

const assertPositiveInteger = (value: number, label: string): void => {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${label} must be a positive integer, got ${value}`);
  }
};

/**
 * In-memory similarity search over embedded document chunks.
 *
 * Every mutation swaps in a new chunk array, so a query always scans one consistent
 * snapshot even while `queryText` calls are awaiting their embeddings.
 */
export class EmbeddingRetriever {
  private chunks: readonly StoredChunk[] = [];
  private establishedDimension: number | undefined;
  private readonly nextChunkNumber = new Map<string, number>();

  constructor(private readonly options: EmbeddingRetrieverOptions = {}) {
    if (options.dimension !== undefined) {
      assertPositiveInteger(options.dimension, 'dimension');
    }
    this.establishedDimension = options.dimension;
  }

  get size(): number {
    return this.chunks.length;
  }

  /** Undefined until the first chunk is added, unless fixed at construction. */
  get dimension(): number | undefined {
    return this.establishedDimension;
  }

  documentIds(): string[] {
    return [...new Set(this.chunks.map((chunk) => chunk.documentId))];
  }

  /**
   * Appends chunks for a document. Embedding dimensions and chunk ids are checked before
   * anything is stored; one bad chunk rejects the whole call.
   */
  add(documentId: string, chunks: readonly RetrieverChunkInput[]): StoredChunk[] {
    if (chunks.length === 0) return [];

    const expected = this.establishedDimension ?? chunks[0].embedding.length;
    if (expected < 1) {
      throw new EmbeddingDimensionError(1, expected);
    }

    for (const chunk of chunks) {
      if (chunk.embedding.length !== expected) {
        throw new EmbeddingDimensionError(expected, chunk.embedding.length);
      }
    }

    let chunkNumber = this.nextChunkNumber.get(documentId) ?? 0;
    const numbered = chunks.map((chunk) => {
      const id = chunk.id ?? `${documentId}_chunk_${chunkNumber}`;
      chunkNumber += 1;
      return { id, chunk };
    });

    const taken = new Set(this.chunks.filter((chunk) => chunk.documentId === documentId).map((chunk) => chunk.id));
    for (const { id } of numbered) {
      if (taken.has(id)) throw new DuplicateChunkIdError(documentId, id);
      taken.add(id);
    }

    const stored = numbered.map(
      ({ id, chunk }): StoredChunk =>
        Object.freeze({
          id,
          documentId,
          text: chunk.text,
          embedding: Object.freeze([...chunk.embedding]),
          metadata: Object.freeze({ ...chunk.metadata })
        })
    );

    this.chunks = [...this.chunks, ...stored];
    this.establishedDimension = expected;
    this.nextChunkNumber.set(documentId, chunkNumber);
    return stored;
  }

  /** Returns the number of chunks removed; unknown documents are a no-op. */
  remove(documentId: string): number {
    const remaining = this.chunks.filter((chunk) => chunk.documentId !== documentId);
    const removed = this.chunks.length - remaining.length;

    this.chunks = remaining;
    this.nextChunkNumber.delete(documentId);
    return removed;
  }

  /** A query vector of the wrong dimension matches nothing. */
  query(embedding: readonly number[], topK: number, similarityThreshold: number): ScoredChunk[] {
    const snapshot = this.chunks;
    if (snapshot.length === 0 || topK <= 0) return [];

    if (this.establishedDimension !== undefined && embedding.length !== this.establishedDimension) {
      console.warn({ scope: 'rag_query', expected: this.establishedDimension, received: embedding.length });
      return [];
    }

    return snapshot
      .map((chunk, order) => ({ chunk, order, score: cosineSimilarity(embedding, chunk.embedding) }))
      .filter((entry) => entry.score >= similarityThreshold)
      .sort((left, right) => right.score - left.score || left.order - right.order)
      .slice(0, topK)
      .map(({ chunk, score }) => ({ chunk, score }));
  }

  async queryText(text: string, options: QueryTextOptions = {}): Promise<ScoredChunk[]> {
    if (this.chunks.length === 0) return [];

    const { provider, model } = this.options;
    if (!provider || !model) {
      throw new Error('EmbeddingRetriever.queryText requires a provider and model.');
    }

    const response = await provider.embed({ model, inputs: [text], timeoutMs: options.timeoutMs });
    const vector = response.vectors[0];
    if (!vector) {
      throw new Error('Embedding provider returned no vector for the query.');
    }

    return this.query(
      vector,
      options.topK ?? this.options.topK ?? DEFAULT_TOP_K,
      options.similarityThreshold ?? this.options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD
    );
  }
}
