export interface EmbeddingProvider {
  embed(input: { model: string; inputs: string[]; timeoutMs?: number }): Promise<{ vectors: number[][] }>;
}

export type QueryRow = Record<string, unknown>;

/** Runs one SQL statement; callers validate the rows they get back. */
export type RagQueryExecutor = (text: string, params?: unknown[]) => Promise<QueryRow[]>;
