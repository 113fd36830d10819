import { z } from 'zod';
import type { RagQueryExecutor, RetrieverChunkInput, StoredChunk } from '@aiflow/rag';
import { chunkMetadataSchema, type ChunkMetadata, type EmbeddingStatus } from '@aiflow/shared';

export interface ReferenceDocumentInput {
  id: string;
  title: string;
  category: string;
}

export interface HydratedChunk extends RetrieverChunkInput {
  id: string;
  metadata: ChunkMetadata;
}

export interface ActiveDocumentChunks {
  documentId: string;
  chunks: HydratedChunk[];
}

const chunkRowSchema = z.object({
  id: z.string(),
  document_id: z.string(),
  chunk_text: z.string(),
  embedding: z.array(z.number()),
  metadata: chunkMetadataSchema
});

const idRowSchema = z.object({ id: z.string() });

/** Reference documents and their embedded chunks, stored as jsonb in Postgres. */
export class ReferenceRepository {
  constructor(private readonly query: RagQueryExecutor) {}

  async upsertDocument(document: ReferenceDocumentInput): Promise<void> {
    await this.query(
      `insert into reference_documents (id, title, category, is_active, embedding_status, chunk_count)
       values ($1, $2, $3, true, 'processing', 0)
       on conflict (id) do update
       set title = excluded.title,
           category = excluded.category,
           is_active = true,
           embedding_status = 'processing',
           chunk_count = 0,
           updated_at = now()`,
      [document.id, document.title, document.category]
    );
  }

  async markStatus(documentId: string, status: EmbeddingStatus, chunkCount = 0): Promise<void> {
    await this.query(
      `update reference_documents
       set embedding_status = $2, chunk_count = $3, updated_at = now()
       where id = $1`,
      [documentId, status, chunkCount]
    );
  }

  /** Swaps the stored chunks of a document; the insert is a single statement. */
  async replaceChunks(documentId: string, chunks: readonly StoredChunk[]): Promise<void> {
    await this.query('delete from reference_chunks where document_id = $1', [documentId]);
    if (chunks.length === 0) return;

    const records = chunks.map((chunk, index) => ({
      id: chunk.id,
      chunk_index: index,
      chunk_text: chunk.text,
      embedding: chunk.embedding,
      metadata: chunk.metadata
    }));

    await this.query(
      `insert into reference_chunks (id, document_id, chunk_index, chunk_text, embedding, metadata)
       select x.id, $1, x.chunk_index, x.chunk_text, x.embedding, x.metadata
       from jsonb_to_recordset($2::jsonb)
         as x(id text, chunk_index integer, chunk_text text, embedding jsonb, metadata jsonb)`,
      [documentId, JSON.stringify(records)]
    );
  }

  async deactivate(documentId: string): Promise<boolean> {
    const rows = await this.query(
      `update reference_documents
       set is_active = false, updated_at = now()
       where id = $1
       returning id`,
      [documentId]
    );
    return rows.some((row) => idRowSchema.safeParse(row).success);
  }

  async loadActiveChunks(): Promise<ActiveDocumentChunks[]> {
    const rows = await this.query(
      `select c.id, c.document_id, c.chunk_text, c.embedding, c.metadata
       from reference_chunks c
       inner join reference_documents d on d.id = c.document_id
       where d.is_active = true and d.embedding_status = 'completed'
       order by d.created_at asc, c.document_id asc, c.chunk_index asc`
    );

    const grouped = new Map<string, HydratedChunk[]>();
    for (const raw of rows) {
      const parsed = chunkRowSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn({ scope: 'rag_hydrate', error: parsed.error.message, message: 'Skipped malformed chunk row.' });
        continue;
      }

      const row = parsed.data;
      const chunks = grouped.get(row.document_id) ?? [];
      chunks.push({ id: row.id, text: row.chunk_text, embedding: row.embedding, metadata: row.metadata });
      grouped.set(row.document_id, chunks);
    }

    return [...grouped].map(([documentId, chunks]) => ({ documentId, chunks }));
  }
}
