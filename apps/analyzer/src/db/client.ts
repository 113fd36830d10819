import 'dotenv/config';
import { Pool, type QueryResultRow } from 'pg';
import type { RagQueryExecutor } from '@aiflow/rag';

export const createPool = (connectionString: string): Pool => new Pool({ connectionString });

export const createQueryExecutor =
  (pool: Pool): RagQueryExecutor =>
  async (text, params = []) => {
    const result = await pool.query<QueryResultRow>(text, params);
    return result.rows;
  };
