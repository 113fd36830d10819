import {
  buildContext,
  chunkText,
  cleanText,
  embedChunks,
  DuplicateChunkIdError,
  EmbeddingDimensionError,
  type BuiltContext,
  type EmbeddingProvider,
  type EmbeddingRetriever
} from '@aiflow/rag';
import type { ReferenceRepository } from './repository';

export interface ReferenceLibraryOptions {
  repository: ReferenceRepository;
  retriever: EmbeddingRetriever;
  embedder: {
    provider: EmbeddingProvider;
    model: string;
  };
  chunkSize: number;
  chunkOverlap: number;
}

export interface IngestReferenceInput {
  documentId: string;
  title: string;
  category: string;
  text: string;
}

export interface IngestReferenceResult {
  documentId: string;
  chunkCount: number;
}

const describeError = (error: unknown, fallback: string): string =>
  error instanceof Error ? error.message : fallback;

const emptyContext = (): BuiltContext => ({ context: '', citations: [] });

/**
 * Reference standards available to drawing reviews. Postgres holds the durable copy; the
 * in-memory retriever answers queries and is rebuilt from storage by `hydrate`.
 */
export class ReferenceLibrary {
  constructor(private readonly options: ReferenceLibraryOptions) {}

  async ingest(input: IngestReferenceInput): Promise<IngestReferenceResult> {
    const { repository, retriever, embedder } = this.options;
    const text = cleanText(input.text);
    if (!text) {
      throw new Error(`Reference document ${input.documentId} has no extractable text`);
    }

    await repository.upsertDocument({ id: input.documentId, title: input.title, category: input.category });

    try {
      const chunks = chunkText(text, {
        size: this.options.chunkSize,
        overlap: this.options.chunkOverlap,
        metadata: { title: input.title, category: input.category, documentId: input.documentId }
      });
      const embedded = await embedChunks(chunks, { provider: embedder.provider, model: embedder.model });

      retriever.remove(input.documentId);
      const stored = retriever.add(input.documentId, embedded);

      try {
        await repository.replaceChunks(input.documentId, stored);
      } catch (error) {
        retriever.remove(input.documentId);
        throw error;
      }

      await repository.markStatus(input.documentId, 'completed', stored.length);
      console.info({ scope: 'rag_ingest', documentId: input.documentId, chunkCount: stored.length });

      return { documentId: input.documentId, chunkCount: stored.length };
    } catch (error) {
      console.error({
        scope: 'rag_ingest',
        documentId: input.documentId,
        error: describeError(error, 'Unknown ingestion error')
      });

      await repository.markStatus(input.documentId, 'failed').catch((statusError: unknown) =>
        console.error({
          scope: 'rag_ingest',
          documentId: input.documentId,
          error: describeError(statusError, 'Unknown status update error')
        })
      );
      throw error;
    }
  }

  async deactivate(documentId: string): Promise<boolean> {
    const updated = await this.options.repository.deactivate(documentId);
    const removed = this.options.retriever.remove(documentId);
    return updated || removed > 0;
  }

  /** Loads every active, completed document into the retriever. Returns the chunk count loaded. */
  async hydrate(): Promise<number> {
    const { repository, retriever } = this.options;
    const documents = await repository.loadActiveChunks();
    let loaded = 0;

    for (const { documentId, chunks } of documents) {
      retriever.remove(documentId);
      try {
        loaded += retriever.add(documentId, chunks).length;
      } catch (error) {
        if (!(error instanceof EmbeddingDimensionError || error instanceof DuplicateChunkIdError)) throw error;
        console.error({ scope: 'rag_hydrate', documentId, error: error.message });
      }
    }

    console.info({ scope: 'rag_hydrate', documents: documents.length, chunks: loaded });
    return loaded;
  }

  /** Never rejects: retrieval failures degrade to an empty context. */
  async retrieveContext(query: string): Promise<BuiltContext> {
    try {
      const results = await this.options.retriever.queryText(query);
      const built = buildContext(results);
      console.info({ scope: 'rag_retrieve', query, chunks: results.length, contextLength: built.context.length });
      return built;
    } catch (error) {
      console.error({ scope: 'rag_retrieve', query, error: describeError(error, 'Unknown retrieval error') });
      return emptyContext();
    }
  }
}
