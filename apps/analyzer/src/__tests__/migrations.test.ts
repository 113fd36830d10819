import type { RagQueryExecutor } from '@aiflow/rag';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { applyMigrations } from '../db/migrations';

const createRecorder = (applied: string[] = []) => {
  const statements: string[] = [];
  const execute = vi.fn<RagQueryExecutor>(async (text, params = []) => {
    statements.push(text);
    if (text.startsWith('select filename') && applied.includes(String(params[0]))) {
      return [{ filename: params[0] }];
    }
    return [];
  });
  return { execute, statements };
};

describe('applyMigrations', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('applies pending files inside a transaction with the embedding dimension filled in', async () => {
    const { execute, statements } = createRecorder();

    await expect(applyMigrations(execute, { embeddingDim: 8 })).resolves.toEqual(['001_reference_documents.sql']);

    const migration = statements[3] ?? '';
    expect(statements[2]).toBe('begin');
    expect(migration).toContain('check (jsonb_array_length(embedding) = 8)');
    expect(migration).not.toContain('__EMBEDDING_DIM__');
    expect(statements.slice(4)).toEqual(['insert into schema_migrations (filename) values ($1)', 'commit']);
    expect(console.info).toHaveBeenCalledWith({ scope: 'db_migrate', file: '001_reference_documents.sql', embeddingDim: 8 });
  });

  it('skips files already recorded', async () => {
    const { execute, statements } = createRecorder(['001_reference_documents.sql']);

    await expect(applyMigrations(execute, { embeddingDim: 8 })).resolves.toEqual([]);
    expect(statements).toHaveLength(2);
    expect(console.info).toHaveBeenCalledWith({ scope: 'db_migrate', file: '001_reference_documents.sql', skipped: true });
  });

  it('rolls back and rethrows when a file fails', async () => {
    const { execute, statements } = createRecorder();
    const failure = new Error('syntax error');
    execute.mockImplementation(async (text) => {
      statements.push(text);
      if (text.includes('create table if not exists reference_documents')) throw failure;
      return [];
    });

    await expect(applyMigrations(execute, { embeddingDim: 8 })).rejects.toBe(failure);
    expect(statements.at(-1)).toBe('rollback');
    expect(statements).not.toContain('commit');
  });
});
