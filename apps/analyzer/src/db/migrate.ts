import type { QueryResultRow } from 'pg';
import type { RagQueryExecutor } from '@aiflow/rag';
import { loadConfig } from '../config';
import { createPool } from './client';
import { applyMigrations } from './migrations';

const { databaseUrl, embeddingDim } = loadConfig();
const pool = createPool(databaseUrl);
const client = await pool.connect();
const execute: RagQueryExecutor = async (text, params = []) => (await client.query<QueryResultRow>(text, params)).rows;

try {
  const applied = await applyMigrations(execute, { embeddingDim });
  console.info({ scope: 'db_migrate', applied: applied.length });
} catch (error) {
  console.error({ scope: 'db_migrate', error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
} finally {
  client.release();
  await pool.end();
}
