import { basename, extname } from 'node:path';
import { OpenAIProvider } from '@aiflow/providers';
import { EmbeddingRetriever } from '@aiflow/rag';
import { ConfigError, loadConfig, type AnalyzerConfig } from './config';
import { createPool, createQueryExecutor } from './db/client';
import { extractDocumentText } from './documents';
import { analyzeDrawing, type AnalysisRequest, type DrawingAnalysis } from './pipeline';
import { ReferenceLibrary, type IngestReferenceResult } from './references/library';
import { ReferenceRepository } from './references/repository';

export { ConfigError, loadConfig, type AnalyzerConfig } from './config';
export { extractDocumentText, UnsupportedDocumentError } from './documents';
export {
  AnalysisTimeoutError,
  analyzeDrawing,
  temperatureForAttempt,
  withTimeout,
  type AnalysisDependencies,
  type AnalysisMetadata,
  type AnalysisRequest,
  type DrawingAnalysis
} from './pipeline';
export { ReferenceLibrary, type IngestReferenceInput, type IngestReferenceResult } from './references/library';
export { ReferenceRepository, type ReferenceDocumentInput } from './references/repository';

export interface IngestFileOptions {
  /** Defaults to the file name without its extension. */
  documentId?: string;
  title?: string;
  category: string;
}

export interface AnalysisService {
  readonly config: AnalyzerConfig;
  readonly library: ReferenceLibrary;
  analyzeDrawing(request: AnalysisRequest): Promise<DrawingAnalysis>;
  ingestFile(buffer: Buffer, filename: string, options: IngestFileOptions): Promise<IngestReferenceResult>;
}

export const createAnalysisService = (config: AnalyzerConfig = loadConfig()): AnalysisService => {
  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    throw new ConfigError(['OPENAI_API_KEY: required for drawing analysis and embeddings']);
  }

  const provider = new OpenAIProvider({ apiKey, baseUrl: config.openai.baseUrl });
  const retriever = new EmbeddingRetriever({
    dimension: config.embeddingDim,
    provider,
    model: config.embeddingModel,
    topK: config.rag.topK,
    similarityThreshold: config.rag.similarityThreshold
  });
  const repository = new ReferenceRepository(createQueryExecutor(createPool(config.databaseUrl)));
  const library = new ReferenceLibrary({
    repository,
    retriever,
    embedder: { provider, model: config.embeddingModel },
    chunkSize: config.rag.chunkSize,
    chunkOverlap: config.rag.chunkOverlap
  });

  return {
    config,
    library,
    analyzeDrawing: (request) =>
      analyzeDrawing(request, {
        provider,
        library: config.rag.enabled ? library : undefined,
        config
      }),
    ingestFile: async (buffer, filename, options) => {
      const stem = basename(filename, extname(filename));
      const text = await extractDocumentText(buffer, filename);
      return library.ingest({
        documentId: options.documentId ?? stem,
        title: options.title ?? stem,
        category: options.category,
        text
      });
    }
  };
};
