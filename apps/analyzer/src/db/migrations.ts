import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { RagQueryExecutor } from '@aiflow/rag';

export const defaultMigrationsDir = fileURLToPath(new URL('../../migrations/', import.meta.url));

export interface ApplyMigrationsOptions {
  directory?: string;
  embeddingDim: number;
}

/**
 * Applies every `.sql` file in the directory, in name order, that `schema_migrations` does not
 * list yet. `execute` must run on a single connection: each file is wrapped in its own
 * transaction. Returns the files applied by this run.
 */
export const applyMigrations = async (
  execute: RagQueryExecutor,
  { directory = defaultMigrationsDir, embeddingDim }: ApplyMigrationsOptions
): Promise<string[]> => {
  const files = (await fs.readdir(directory))
    .filter((name) => name.endsWith('.sql'))
    .sort((left, right) => left.localeCompare(right));

  await execute(
    'create table if not exists schema_migrations (filename text primary key, applied_at timestamptz not null default now())'
  );

  const applied: string[] = [];
  for (const file of files) {
    const existing = await execute('select filename from schema_migrations where filename = $1', [file]);
    if (existing.length > 0) {
      console.info({ scope: 'db_migrate', file, skipped: true });
      continue;
    }

    const sql = (await fs.readFile(path.join(directory, file), 'utf-8')).replaceAll(
      '__EMBEDDING_DIM__',
      String(embeddingDim)
    );

    await execute('begin');
    try {
      await execute(sql);
      await execute('insert into schema_migrations (filename) values ($1)', [file]);
      await execute('commit');
    } catch (error) {
      await execute('rollback');
      throw error;
    }
    console.info({ scope: 'db_migrate', file, embeddingDim });
    applied.push(file);
  }

  return applied;
};
