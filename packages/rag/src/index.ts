import type { EmbeddingProvider } from './types';
import type { ScoredChunk } from './retriever';

export * from './types';
export * from './retriever';
export { cosineSimilarity } from './similarity';

export interface ChunkingOptions {
  size?: number;
  overlap?: number;
  metadata?: Record<string, unknown>;
}

export interface TextChunk {
  text: string;
  metadata: Record<string, unknown> & { chunkIndex: number; chunkSize: number };
}

export interface EmbeddedChunk extends TextChunk {
  embedding: number[];
}

export interface EmbedChunksOptions {
  provider: EmbeddingProvider;
  model: string;
  batchSize?: number;
  timeoutMs?: number;
}

export interface CitationEntry {
  chunkId: string;
  score: number;
  title: string;
}

export interface BuiltContext {
  context: string;
  citations: CitationEntry[];
}

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;
const DEFAULT_EMBED_BATCH_SIZE = 64;

const PAGE_NUMBER_LINE = /^(?:page\s+)?\d+(?:\s+of\s+\d+)?$/i;

/**
 * Normalizes extracted document text: trims lines, drops page-number lines, collapses
 * runs of spaces and keeps at most one blank line between paragraphs.
 */
export const cleanText = (text: string): string => {
  const lines: string[] = [];

  for (const rawLine of text.split(/\r\n|\r|\n/)) {
    const line = rawLine.trim().replace(/[ \t]+/g, ' ');
    if (PAGE_NUMBER_LINE.test(line)) continue;

    if (!line) {
      if (lines.length > 0 && lines[lines.length - 1] !== '') lines.push('');
      continue;
    }

    lines.push(line);
  }

  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  return lines.join('\n');
};

const resolveCutIndex = (text: string, start: number, targetEnd: number): number => {
  if (targetEnd >= text.length) return text.length;
  const floor = Math.min(text.length, Math.max(start, targetEnd - 120));
  const window = text.slice(floor, targetEnd);
  const lastBreak = Math.max(window.lastIndexOf('\n'), window.lastIndexOf(' '), window.lastIndexOf('\t'));
  if (lastBreak <= 0) return targetEnd;
  return floor + lastBreak;
};

// Paragraphs longer than a whole chunk are cut near whitespace.
const splitOversized = (paragraph: string, size: number): string[] => {
  if (paragraph.length <= size) return [paragraph];

  const pieces: string[] = [];
  let cursor = 0;
  while (cursor < paragraph.length) {
    const end = resolveCutIndex(paragraph, cursor, Math.min(cursor + size, paragraph.length));
    const piece = paragraph.slice(cursor, end).trim();
    if (piece) pieces.push(piece);
    cursor = end;
  }

  return pieces;
};

/**
 * Paragraph-based chunking. Paragraphs (split on blank lines) accumulate until the next one
 * would push the chunk past `size`; the following chunk then opens with the last `overlap`
 * characters of the one just closed.
 */
export const chunkText = (text: string, options: ChunkingOptions = {}): TextChunk[] => {
  const size = Math.max(1, options.size ?? DEFAULT_CHUNK_SIZE);
  const overlap = Math.max(0, Math.min(options.overlap ?? DEFAULT_CHUNK_OVERLAP, size - 1));
  const paragraphs = text
    .split(/\n[ \t]*\n/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean)
    .flatMap((paragraph) => splitOversized(paragraph, size));

  const chunks: TextChunk[] = [];
  const pushChunk = (value: string): void => {
    const trimmed = value.trim();
    if (!trimmed) return;
    chunks.push({
      text: trimmed,
      metadata: { ...options.metadata, chunkIndex: chunks.length, chunkSize: value.length }
    });
  };

  let current = '';
  for (const paragraph of paragraphs) {
    if (current && current.length + paragraph.length > size) {
      pushChunk(current);
      current = overlap > 0 ? `${current.slice(-overlap)}\n${paragraph}` : paragraph;
    } else {
      current = current ? `${current}\n\n${paragraph}` : paragraph;
    }
  }
  pushChunk(current);

  return chunks;
};

export const embedChunks = async (chunks: TextChunk[], options: EmbedChunksOptions): Promise<EmbeddedChunk[]> => {
  if (chunks.length === 0) return [];

  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_EMBED_BATCH_SIZE);
  const withVectors: EmbeddedChunk[] = [];

  for (let start = 0; start < chunks.length; start += batchSize) {
    const batch = chunks.slice(start, start + batchSize);
    const response = await options.provider.embed({
      model: options.model,
      inputs: batch.map((chunk) => chunk.text),
      timeoutMs: options.timeoutMs
    });

    if (response.vectors.length !== batch.length) {
      throw new Error(
        `Embedding vector count mismatch for batch starting at ${start}: expected ${batch.length}, got ${response.vectors.length}`
      );
    }

    batch.forEach((chunk, i) => {
      withVectors.push({ ...chunk, embedding: response.vectors[i] });
    });
  }

  return withVectors;
};

const metadataString = (value: unknown, fallback: string): string =>
  typeof value === 'string' && value.trim().length > 0 ? value : fallback;

export const buildContext = (results: ScoredChunk[]): BuiltContext => {
  const citations: CitationEntry[] = [];
  const blocks: string[] = [];

  for (const { chunk, score } of results) {
    const title = metadataString(chunk.metadata.title, 'Unknown');
    const category = metadataString(chunk.metadata.category, 'document');

    citations.push({ chunkId: chunk.id, score, title });
    blocks.push(`[${category.toUpperCase()}: ${title}]\n${chunk.text}\n`);
  }

  return {
    context: blocks.join('\n---\n'),
    citations
  };
};
